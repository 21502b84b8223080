import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { AmbiguousEntryScriptError } from "./errors";

/**
 * List all files under a directory recursively.
 * A missing directory yields an empty list.
 */
export async function listFilesRecursive(root: string): Promise<string[]> {
	const results: string[] = [];
	const stack: string[] = [root];

	while (stack.length > 0) {
		const folder = stack.pop();
		if (folder === undefined) {
			continue;
		}

		let entries: Dirent[];
		try {
			entries = await readdir(folder, { withFileTypes: true });
		} catch (error) {
			if (folder === root && isMissing(error)) {
				return results;
			}
			throw error;
		}

		for (const entry of entries) {
			const entryPath = join(folder, entry.name);
			if (entry.isDirectory()) {
				stack.push(entryPath);
			} else if (entry.isFile()) {
				results.push(entryPath);
			}
		}
	}

	return results.sort();
}

/**
 * Find the only file with the given name under a directory.
 * @returns the file path, or null when there is none
 * @throws AmbiguousEntryScriptError when several files have that name
 */
export async function findSingleFileIn(root: string, fileName: string): Promise<string | null> {
	const files = await listFilesRecursive(root);
	const matches = files.filter((file) => baseName(file) === fileName);
	if (matches.length === 0) {
		return null;
	}
	if (matches.length > 1) {
		throw new AmbiguousEntryScriptError(fileName, root, matches);
	}
	return matches[0] ?? null;
}

function baseName(filePath: string): string {
	const normalized = filePath.replace(/\\/g, "/");
	return normalized.slice(normalized.lastIndexOf("/") + 1);
}

function isMissing(error: unknown): boolean {
	return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}
