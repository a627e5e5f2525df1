export interface SavePathProvider {
  /** Absolute directory that holds every save file of `projectTitle`. */
  resolveRoot(projectTitle: string): string;
}
