export interface ArtifactWriter {
  persist(path: string, content: string): Promise<void>;
}
