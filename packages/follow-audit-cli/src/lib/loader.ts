import { readFile } from "fs/promises";
import { fileIsDirectory, fileNotFound, fileNotReadable } from "./errors/catalog.js";
import { errorMessage, type CLIError } from "./errors/types.js";

/** Raw text of one exported HTML page */
export type Document = string;

export interface DocumentPair {
  followers: Document;
  followings: Document;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function toReadError(path: string, error: unknown): CLIError {
  switch (errnoCode(error)) {
    case "ENOENT":
      return fileNotFound(path);
    case "EISDIR":
      return fileIsDirectory(path);
    default:
      return fileNotReadable(path, errorMessage(error));
  }
}

/**
 * Read an export file as UTF-8 text.
 */
export async function readDocument(path: string): Promise<Document> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw toReadError(path, error);
  }
}

/**
 * Read both exports. Followers is read first, so a missing followers file
 * is reported even when the followings path is also wrong.
 */
export async function readDocuments(followersPath: string, followingsPath: string): Promise<DocumentPair> {
  const followers = await readDocument(followersPath);
  const followings = await readDocument(followingsPath);
  return { followers, followings };
}
