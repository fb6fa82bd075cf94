import { createHash } from "node:crypto";
import type { UserParams } from "@/types";
import { userParamsToMap } from "./parameterMap";

/**
 * Stable signature of a parameter set: SHA-256 hex of the sorted
 * `key=value` lines of its string map. Independent of key order.
 */
export function computeParameterSignature(params: UserParams): string {
  const map = userParamsToMap(params);
  const lines = Object.keys(map)
    .sort()
    .map((key) => `${key}=${map[key]}`);
  return createHash("sha256").update(lines.join("\n")).digest("hex");
}
