import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../logger";

export function uploadPathFor(uploadDir: string, id: string) {
  return path.join(uploadDir, `financial_document_${id}.pdf`);
}

export function isPdfFilename(filename?: string | null) {
  return Boolean(filename && filename.toLowerCase().endsWith(".pdf"));
}

export async function saveUpload(uploadDir: string, id: string, content: Buffer) {
  await fs.mkdir(uploadDir, { recursive: true });
  const filePath = uploadPathFor(uploadDir, id);
  await fs.writeFile(filePath, content);
  return filePath;
}

export async function fileExists(filePath: string) {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

export type FileRemover = (filePath: string) => Promise<boolean>;

/**
 * Deletes a temporary upload if it is still there. Never throws: a failed
 * delete is logged and reported as `false`.
 */
export const removeUpload: FileRemover = async (filePath) => {
  try {
    await fs.rm(filePath, { force: true });
    return true;
  } catch (error) {
    logger.warn({ error, filePath }, "Failed to delete temporary upload");
    return false;
  }
};
