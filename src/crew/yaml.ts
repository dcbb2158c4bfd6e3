import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "./errors.ts";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Read and parse a YAML config file; every failure is a `ConfigurationError`. */
export async function loadYamlFile(yamlPath: string, label: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(yamlPath, "utf-8");
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      throw new ConfigurationError(`${label} file not found: ${yamlPath}`, [
        `File not found: ${yamlPath}`,
      ]);
    }
    throw new ConfigurationError(`Failed to read ${label}: ${yamlPath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  try {
    return parseYaml(content);
  } catch (err: unknown) {
    throw new ConfigurationError(`Invalid YAML in ${label}: ${yamlPath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
}

export function failValidation(label: string, errors: readonly string[]): never {
  throw new ConfigurationError(
    `${label} validation failed with ${errors.length} error(s):\n${errors.map((e) => `  - ${e}`).join("\n")}`,
    errors,
  );
}
