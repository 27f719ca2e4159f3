import * as path from "node:path";
import { ValidationError } from "@parley/core";

/**
 * Resolves `candidatePath` against `root`, refusing anything that lands outside it.
 */
export function resolveWorkspacePath(root: string, candidatePath: string): string {
    const base = path.resolve(root);
    const fullPath = path.resolve(base, candidatePath);
    const relative = path.relative(base, fullPath);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
        throw new ValidationError(`Path escapes the knowledge base: ${candidatePath}`);
    }
    return fullPath;
}
