import fs from "fs/promises";
import path from "path";
import logger from "./logger";
import { sanitizeFilename } from "./sanitizer";

/**
 * A private directory for one request's uploads. Disposing removes the
 * directory and everything in it; a second dispose is a no-op.
 */
export class TempWorkspace {
  private disposed = false;
  private counter = 0;

  private constructor(readonly dir: string) {}

  static async create(
    root: string,
    prefix = "pdf-toolkit-",
  ): Promise<TempWorkspace> {
    await fs.mkdir(root, { recursive: true });
    const dir = await fs.mkdtemp(path.join(root, prefix));
    logger.debug(`Created temp workspace ${dir}`);
    return new TempWorkspace(dir);
  }

  /** Unique on-disk name for an upload, e.g. `002_report.pdf`. */
  reserveName(originalName: string): string {
    this.counter += 1;
    const index = String(this.counter).padStart(3, "0");
    return `${index}_${sanitizeFilename(originalName)}`;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    try {
      await fs.rm(this.dir, { recursive: true, force: true });
      logger.debug(`Cleaned up temp workspace ${this.dir}`);
    } catch (error) {
      logger.warn(`Error cleaning up temp workspace ${this.dir}:`, error);
    }
  }
}
