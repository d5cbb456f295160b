/**
 * Path containment checks for entries under a backup directory
 */

import * as path from "node:path";

/**
 * True when `filePath` names an entry strictly below `dir`; `dir` itself
 * does not count
 */
export function isPathWithinDir(filePath: string, dir: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(filePath));
  return (
    relative !== "" &&
    !relative.startsWith("..") &&
    !path.isAbsolute(relative)
  );
}
