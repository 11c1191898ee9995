import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

/**
 * Synchronous file access used by the applicator. Paths are absolute.
 */
export interface FileStore {
	exists(path: string): boolean;
	read(path: string): string;
	write(path: string, content: string): void;
	remove(path: string): void;
}

export function createDiskFileStore(): FileStore {
	return {
		exists(path: string): boolean {
			return existsSync(path);
		},
		read(path: string): string {
			return readFileSync(path, "utf-8");
		},
		write(path: string, content: string): void {
			mkdirSync(dirname(path), { recursive: true });
			writeFileSync(path, content, "utf-8");
		},
		remove(path: string): void {
			if (statSync(path).isDirectory()) {
				throw new Error(`Refusing to delete directory ${path}`);
			}
			rmSync(path);
		},
	};
}

/**
 * Overlay that records writes and deletions in memory and reads through to `base`
 * for everything it has not touched.
 */
export function createDryRunFileStore(base: FileStore = createDiskFileStore()): FileStore & {
	pending(): Map<string, string | null>;
} {
	const overlay = new Map<string, string | null>();
	const exists = (path: string): boolean => {
		const staged = overlay.get(path);
		if (staged !== undefined) {
			return staged !== null;
		}
		return base.exists(path);
	};

	return {
		exists,
		read(path: string): string {
			const staged = overlay.get(path);
			if (staged === null) {
				throw new Error(`ENOENT: no such file, open '${path}'`);
			}
			return staged ?? base.read(path);
		},
		write(path: string, content: string): void {
			overlay.set(path, content);
		},
		remove(path: string): void {
			if (!exists(path)) {
				throw new Error(`ENOENT: no such file, unlink '${path}'`);
			}
			overlay.set(path, null);
		},
		pending(): Map<string, string | null> {
			return new Map(overlay);
		},
	};
}
