/**
 * File reading utilities built on the Effect platform FileSystem
 *
 * Every helper validates its path with ArkType, runs a small Effect program
 * against the platform layer and converts platform failures into FileError
 * so callers only deal with the genescreen error hierarchy.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { FileError } from "../errors";
import { FilePathSchema } from "../types";
import { getPlatform } from "./runtime";

export interface FileReaderOptions {
  /** Chunk size used when streaming (default 64KB) */
  bufferSize?: number;
}

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
};

function runWithPlatform<A, E>(program: Effect.Effect<A, E, FileSystem.FileSystem>): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}

/**
 * Check if a regular file exists at the given path
 *
 * @throws {FileError} If path validation fails or the path cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Check if a directory exists at the given path
 */
export async function isDirectory(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "Directory";
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * List the entry names of a directory, sorted
 *
 * @throws {FileError} If the directory cannot be read
 */
export async function listDirectory(path: string): Promise<string[]> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readDirectory(validatedPath);
  });

  try {
    const entries = await runWithPlatform(program);
    return [...entries].sort();
  } catch (error) {
    throw FileError.fromSystemError("list", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * @throws {FileError} If the file does not exist or cannot be opened
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const { bufferSize } = { ...DEFAULT_OPTIONS, ...options };

  if (!(await exists(validatedPath))) {
    throw new FileError("File does not exist or is not accessible", validatedPath, "open");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, { bufferSize });
    return Stream.toReadableStream(effectStream);
  });

  try {
    return await runWithPlatform(program);
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}
