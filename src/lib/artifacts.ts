/**
 * Atomic artifact output.
 *
 * Every artifact is written to a hidden temporary file next to its final
 * path and fsynced. Only once all of them exist are they renamed into place.
 * If a rename fails, the files already renamed are replaced by the ones they
 * overwrote, so a failed run leaves the directory as it found it.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { FilesystemError } from "@/lib/errors";

export interface Artifact {
  fileName: string;
  contents: string | Buffer;
}

export interface WrittenArtifact {
  path: string;
  size: number;
}

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

function tempPathFor(outDir: string, fileName: string): string {
  return path.join(outDir, `.${fileName}.${process.pid}.tmp`);
}

function backupPathFor(outDir: string, fileName: string): string {
  return path.join(outDir, `.${fileName}.${process.pid}.bak`);
}

// Returns the backup path, or null when there was nothing to move
async function moveAside(filePath: string, backupPath: string): Promise<string | null> {
  try {
    await fs.rename(filePath, backupPath);
    return backupPath;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  }
}

async function rollBack(committed: Array<{ finalPath: string; backupPath: string | null }>): Promise<void> {
  for (const { finalPath, backupPath } of [...committed].reverse()) {
    try {
      await fs.rm(finalPath, { force: true });
      if (backupPath) await fs.rename(backupPath, finalPath);
    } catch (error) {
      console.warn(`  Warning: could not restore ${finalPath}: ${errorMessage(error)}`);
    }
  }
}

async function writeDurably(filePath: string, contents: string | Buffer): Promise<void> {
  const handle = await fs.open(filePath, "w");
  try {
    await handle.writeFile(contents);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function removeAll(paths: string[]): Promise<void> {
  const results = await Promise.allSettled(paths.map((p) => fs.rm(p, { force: true })));
  for (const result of results) {
    if (result.status === "rejected") {
      console.warn(`  Warning: could not remove temporary file: ${errorMessage(result.reason)}`);
    }
  }
}

export async function writeArtifacts(outDir: string, artifacts: Artifact[]): Promise<WrittenArtifact[]> {
  const names = new Set<string>();
  for (const artifact of artifacts) {
    if (artifact.fileName !== path.basename(artifact.fileName) || names.has(artifact.fileName)) {
      throw new FilesystemError(`Invalid or duplicate artifact name: ${artifact.fileName}`, artifact.fileName);
    }
    names.add(artifact.fileName);
  }

  try {
    await fs.mkdir(outDir, { recursive: true });
  } catch (error) {
    throw new FilesystemError(`Cannot create output directory ${outDir}: ${errorMessage(error)}`, outDir, {
      cause: error,
    });
  }

  const staged: string[] = [];
  for (const artifact of artifacts) {
    const tempPath = tempPathFor(outDir, artifact.fileName);
    staged.push(tempPath);
    try {
      await writeDurably(tempPath, artifact.contents);
    } catch (error) {
      await removeAll(staged);
      throw new FilesystemError(`Cannot write ${tempPath}: ${errorMessage(error)}`, tempPath, { cause: error });
    }
  }

  // Existing outputs are moved aside first so a failed rename can put them back
  const committed: Array<{ finalPath: string; backupPath: string | null }> = [];
  const written: WrittenArtifact[] = [];
  for (const [i, artifact] of artifacts.entries()) {
    const finalPath = path.join(outDir, artifact.fileName);
    try {
      const backupPath = await moveAside(finalPath, backupPathFor(outDir, artifact.fileName));
      committed.push({ finalPath, backupPath });
      await fs.rename(staged[i], finalPath);
    } catch (error) {
      await rollBack(committed);
      await removeAll(staged.slice(i));
      throw new FilesystemError(`Cannot move ${artifact.fileName} into place: ${errorMessage(error)}`, finalPath, {
        cause: error,
      });
    }
    written.push({ path: finalPath, size: Buffer.byteLength(artifact.contents) });
  }

  await removeAll(committed.flatMap((c) => (c.backupPath ? [c.backupPath] : [])));
  return written;
}
