export type LockedStyleParams = {
  modelId: string;
  steps: number;
  // guidance weight
  cfgScale: number;
  seedBase: number;
  width: number;
  height: number;
  promptSuffix: string;
};

export type LockedStyleConfig = Readonly<
  LockedStyleParams & {
    projectId: string;
    version: number;
    createdAt: string; // ISO date
  }
>;

export type CreateLockedStyleInput = LockedStyleParams & {
  projectId: string;
  version?: number;
  createdAt?: string;
};
