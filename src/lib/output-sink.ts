/**
 * Output sinks
 *
 * Everything a run persists goes through an OutputSink, addressed by a path
 * relative to the output root.
 *
 * @module output-sink
 */

import * as fs from "fs";
import * as path from "path";

export interface OutputSink {
  /** Write a text file and return where it ended up. */
  write(relativePath: string, content: string): Promise<string>;
}

export class FileSystemOutputSink implements OutputSink {
  readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
  }

  async write(relativePath: string, content: string): Promise<string> {
    const target = this.resolve(relativePath);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, content, "utf8");
    return target;
  }

  private resolve(relativePath: string): string {
    if (path.isAbsolute(relativePath)) {
      throw new Error(`Output path must be relative: ${relativePath}`);
    }
    const target = path.resolve(this.rootDir, relativePath);
    const rel = path.relative(this.rootDir, target);
    if (rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new Error(`Output path escapes the output directory: ${relativePath}`);
    }
    return target;
  }
}
