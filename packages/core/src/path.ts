import { MAX_PATH_DEPTH, type NavigationPath } from "./types.js";

export const ROOT_PATH: NavigationPath = [];

/**
 * Apply a `cd` target to the current path, lexically.
 *
 * The target is split on `/`: `..` pops the last segment (no-op at the
 * root), `.` and empty components are dropped, anything else is appended.
 * Nothing is rejected here; validation happens against the server.
 */
export function resolveCandidatePath(current: NavigationPath, target: string): NavigationPath {
  const candidate = [...current];
  for (const component of target.split("/")) {
    if (component === "..") {
      candidate.pop();
    } else if (component !== "." && component !== "") {
      candidate.push(component);
    }
  }
  return candidate;
}

export function pathDepth(path: NavigationPath): number {
  return path.length;
}

/**
 * At most three segments, none of them empty.
 */
export function isWellFormedPath(path: NavigationPath): boolean {
  return path.length <= MAX_PATH_DEPTH && path.every((segment) => segment.length > 0);
}

/**
 * `/` at the root, otherwise the segments joined by `/`.
 */
export function formatPath(path: NavigationPath): string {
  return path.length === 0 ? "/" : path.join("/");
}
