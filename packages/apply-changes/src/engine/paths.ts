import { existsSync, lstatSync, realpathSync } from "node:fs";
import path from "node:path";
import { createErrorRecord } from "../errors.js";
import type { ApplyErrorRecord } from "../types.js";

export type ResolvedEntryPath =
	| { ok: true; absolutePath: string; relativePath: string }
	| { ok: false; error: ApplyErrorRecord };

function toPosixPath(value: string): string {
	return value.split(path.sep).join("/");
}

function isOutside(relative: string): boolean {
	return relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
}

/**
 * Real path of `target`, following symlinks in its deepest existing ancestor.
 * Segments below that ancestor do not exist yet and are appended unchanged.
 * Returns undefined when a dangling symlink sits on the way, since its target is unknown.
 */
export function resolveRealPath(target: string): string | undefined {
	const pending: string[] = [];
	let current = target;
	while (!existsSync(current)) {
		if (lstatSync(current, { throwIfNoEntry: false })?.isSymbolicLink()) {
			return undefined;
		}
		const parent = path.dirname(current);
		if (parent === current) {
			return target;
		}
		pending.unshift(path.basename(current));
		current = parent;
	}
	return path.join(realpathSync(current), ...pending);
}

/**
 * Resolve an entry's path against the base directory. Paths that are empty, point at
 * the base directory itself, or resolve outside it (directly or through a symlink) are
 * rejected before anything is read or written.
 */
export function resolveEntryPath(baseDir: string, file: string): ResolvedEntryPath {
	const trimmed = file.trim();
	const reject = (message: string): ResolvedEntryPath => ({
		ok: false,
		error: createErrorRecord("file_path", message, { details: { file }, ref: { file } }),
	});

	if (!trimmed || trimmed.includes("\0")) {
		return reject("File path missing or empty");
	}

	const root = path.resolve(baseDir);
	const resolved = path.resolve(root, trimmed);
	const relative = path.relative(root, resolved);
	if (!relative || relative === ".") {
		return reject("File path must name a file inside the base directory");
	}
	if (isOutside(relative)) {
		return reject("File path is outside the base directory");
	}

	const realRoot = resolveRealPath(root) ?? root;
	const realTarget = resolveRealPath(resolved);
	const realRelative = realTarget === undefined ? undefined : path.relative(realRoot, realTarget);
	if (!realRelative || realRelative === "." || isOutside(realRelative)) {
		return reject("File path resolves outside the base directory through a symlink");
	}

	return { ok: true, absolutePath: resolved, relativePath: toPosixPath(relative) };
}
