// ============================================
// Data files — JSON tables shipped beside the code in /data
// ============================================

import fs from "fs";
import { fileURLToPath } from "url";
import type { z } from "zod";
import { QueryEngineError } from "./errors.js";

const DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

/**
 * Read and validate a JSON table from the data directory.
 * A missing or malformed table is a configuration error.
 */
export function readDataFile<T extends z.ZodTypeAny>(fileName: string, schema: T): z.infer<T> {
  const filePath = `${DATA_DIR}${fileName}`;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new QueryEngineError({
      code: "CONFIG_ERROR",
      message: `Could not read data file ${fileName}`,
      cause: err,
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new QueryEngineError({
      code: "CONFIG_ERROR",
      message: `Invalid data file ${fileName}: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    });
  }

  return parsed.data;
}
