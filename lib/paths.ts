import path from "node:path";
export const ROOT = process.cwd();

export const STYLE_LOCKS_ROOT = path.join(ROOT, ".style-locks");

export function projectStyleDir(root: string, projectId: string) {
  return path.join(root, projectId);
}

export function styleRecordPath(root: string, projectId: string) {
  return path.join(projectStyleDir(root, projectId), "style-lock.json");
}

export function styleRecordArchivePath(root: string, projectId: string, version: number) {
  return path.join(projectStyleDir(root, projectId), `style-lock.v${version}.json`);
}

export function projectLocksDir(root: string, projectId: string) {
  return path.join(projectStyleDir(root, projectId), "locks");
}
