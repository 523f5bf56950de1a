import { readFileSync } from "node:fs";

const readPackageVersion = (): string => {
  try {
    const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return "0.0.0";
};

export const packageVersion = readPackageVersion();
