import { constants, promises as fs } from "node:fs";

const isReadableFile = async (candidate: string): Promise<boolean> => {
  if (!candidate) return false;
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, constants.R_OK);
    return true;
  } catch {
    return false;
  }
};

/**
 * A url naming a readable file fans out to every non-blank trimmed line of it, in file order.
 * Anything else is a single target.
 */
export const expandTargets = async (url: string): Promise<string[]> => {
  if (!(await isReadableFile(url))) {
    return [url.trim()];
  }
  const content = await fs.readFile(url, "utf8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
};
