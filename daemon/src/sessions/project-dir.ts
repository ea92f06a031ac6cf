import type { ProjectDirectory } from "./types.js";

const PATH_DELIM = "-";

/**
 * Decode a project directory name into a display name and path.
 * e.g. "-Users-alice-proj" → { projectName: "proj", projectPath: "/Users/alice/proj" }
 *
 * Lossy: a `-` inside a real path segment is indistinguishable from a
 * separator, so "-Users-alice-my-app" decodes to name "app".
 * Names without a leading delimiter are passed through verbatim.
 */
export function decodeProjectDir(dirName: string): ProjectDirectory {
  if (!dirName.startsWith(PATH_DELIM)) {
    return { dirName, projectName: dirName, projectPath: dirName };
  }

  const parts = dirName.split(PATH_DELIM);
  const named = parts.filter((p) => p.length > 0);
  const projectName = named.length > 0 ? named[named.length - 1] : dirName;
  const projectPath =
    parts.length > 1 ? "/" + parts.slice(1).join("/") : dirName;

  return { dirName, projectName, projectPath };
}
