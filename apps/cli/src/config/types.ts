export type PortcheckConfig = {
  /** Path of the JSON manifest listing the module's port declarations. */
  manifest: string;
  color: boolean;
  json: boolean;
  maxAliasDepth?: number;
};
