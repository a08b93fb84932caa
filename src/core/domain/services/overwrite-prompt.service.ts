export interface IOverwritePrompt {
  /** Resolves true when the existing file at `path` may be replaced. */
  confirmOverwrite(path: string): Promise<boolean>;
}
