import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import type { ReportSink } from "../../ports/ReportSink";

const isNotFound = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";

/**
 * Writes each object under `baseDir`, via a temp file and rename so readers never see a partial body.
 */
export class LocalFileSink implements ReportSink {
  readonly description: string;
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
    this.description = `local:${this.baseDir}`;
  }

  resolvePath(name: string): string {
    const target = path.resolve(this.baseDir, name);
    const relative = path.relative(this.baseDir, target);
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Object name escapes the output directory: ${name}`);
    }
    return target;
  }

  async exists(name: string): Promise<boolean> {
    try {
      await fs.access(this.resolvePath(name));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async write(name: string, body: string, _contentType: string): Promise<void> {
    const target = this.resolvePath(name);
    await fs.mkdir(path.dirname(target), { recursive: true });

    const temp = `${target}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(temp, body, "utf8");
      await fs.rename(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true });
      throw err;
    }
  }
}
