const PROJECT_ID_RE = /^[a-z0-9][a-z0-9_-]{0,62}$/;

export function isValidProjectId(projectId: string) {
  return PROJECT_ID_RE.test(projectId);
}
