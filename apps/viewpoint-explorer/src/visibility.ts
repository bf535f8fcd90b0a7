import { readFile } from "node:fs/promises";
import path from "node:path";
import { OrientationVisibilityPredicate, TableVisibilityPredicate } from "@viewsynth/plane-core";
import type { ObjectClass, VisibilityPredicate } from "@viewsynth/plane-core";
import { ConfigurationError, consoleLogger } from "@viewsynth/session-core";
import type { Logger } from "@viewsynth/session-core";

export function visibilityTablePath(cadRoot: string, objectClass: ObjectClass): string {
  return path.join(cadRoot, `visibility_${objectClass}.json`);
}

/**
 * Uses the precomputed table beside the CAD models when there is one, and
 * falls back to plane orientation otherwise.
 */
export async function loadVisibilityPredicate(
  cadRoot: string,
  objectClass: ObjectClass,
  logger: Logger = consoleLogger
): Promise<VisibilityPredicate> {
  const file = visibilityTablePath(cadRoot, objectClass);
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.info(`No visibility table at ${file}, using plane orientation`);
      return new OrientationVisibilityPredicate();
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Visibility table ${file} is not valid JSON`, { cause: err });
  }
  return TableVisibilityPredicate.fromJson(raw);
}
