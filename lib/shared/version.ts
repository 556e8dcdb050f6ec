/**
 * Version constant read from package.json at module load time
 */
import { readFileSync } from "node:fs";

const packageJsonUrl = new URL("../../package.json", import.meta.url);

function readVersion(): string {
  const json: unknown = JSON.parse(readFileSync(packageJsonUrl, "utf8"));
  if (
    typeof json === "object" && json !== null && "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "unknown";
}

export const VERSION = readVersion();
