import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { ArtifactWriter } from "../../ports/ArtifactWriter";

export class FileArtifactWriter implements ArtifactWriter {
  async persist(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf8");
  }
}
