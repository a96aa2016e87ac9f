import archiver from "archiver";
import { PassThrough } from "stream";
import logger from "../utils/logger";
import { ProcessingError } from "../utils/errors";
import type { NamedOutput } from "../models/processing.model";

/** Zips outputs into a single in-memory archive, entries in the given order. */
export async function createZip(entries: NamedOutput[]): Promise<Uint8Array> {
  const archive = archiver("zip", { zlib: { level: 9 } });
  const sink = new PassThrough();
  const chunks: Buffer[] = [];

  const done = new Promise<Buffer>((resolve, reject) => {
    sink.on("data", (chunk: Buffer) => chunks.push(chunk));
    sink.on("end", () => resolve(Buffer.concat(chunks)));
    sink.on("error", reject);
    archive.on("error", reject);
    archive.on("warning", (err) => {
      logger.warn("Archiver warning:", err);
    });
  });

  archive.pipe(sink);
  for (const entry of entries) {
    archive.append(Buffer.from(entry.data), { name: entry.name });
  }

  try {
    await archive.finalize();
    const zipped = await done;
    logger.debug(`Created zip with ${entries.length} entries`, {
      bytes: zipped.byteLength,
    });
    return zipped;
  } catch (error) {
    logger.error("Error generating zip:", error);
    throw new ProcessingError("Failed to create archive", error);
  }
}
