import { readFile } from "fs/promises";
import { ValidationError, errorMessage } from "../errors.js";

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf-8"));
  }
  return chunks.join("");
}

/** Reads one JSON document from `path`, or from `stdin` when no path is given. */
export async function readInput(
  path?: string,
  stdin: NodeJS.ReadableStream = process.stdin
): Promise<unknown> {
  let raw: string;
  if (path) {
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      throw new ValidationError(`Could not read input file ${path}: ${errorMessage(error)}`);
    }
  } else {
    raw = await readStream(stdin);
  }

  if (!raw.trim()) {
    throw new ValidationError("No input JSON provided");
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Invalid JSON input: ${errorMessage(error)}`);
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ValidationError("Input JSON must be an object");
  }
  return data;
}
