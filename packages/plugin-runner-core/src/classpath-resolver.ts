import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { noopLogger, type ClasspathEntry, type Environment, type Logger } from "./types";

/** Directive keyword following the comment marker */
export const ADD_TO_CLASSPATH_KEYWORD = "add-to-classpath ";

const VARIABLE_PATTERN = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Existence check used for classpath entries
 */
export type PathProbe = (path: string) => boolean;

/**
 * Default probe: the path (or `file:` URL) exists as a file or directory
 */
export const pathExists: PathProbe = (path) => existsSync(toFilePath(path));

/**
 * Line prefix of a classpath directive for a comment marker, e.g. `// add-to-classpath `
 */
export function classpathDirectivePrefix(commentMarker: string): string {
	return `${commentMarker} ${ADD_TO_CLASSPATH_KEYWORD}`;
}

/**
 * Replace `$NAME` and `${NAME}` tokens with environment values in a single pass.
 * Tokens naming unknown variables are kept as written.
 */
export function inlineEnvironmentVariables(path: string, environment: Environment): string {
	return path.replace(VARIABLE_PATTERN, (token: string, braced?: string, bare?: string) => {
		const name = braced ?? bare ?? "";
		return Object.prototype.hasOwnProperty.call(environment, name) ? environment[name] : token;
	});
}

/**
 * Parse every directive line into a classpath entry, preserving order
 */
export function resolveClasspathEntries(
	lines: readonly string[],
	prefix: string,
	environment: Environment,
	probe: PathProbe = pathExists,
	logger: Logger = noopLogger
): ClasspathEntry[] {
	const entries: ClasspathEntry[] = [];
	for (const line of lines) {
		if (!line.startsWith(prefix)) {
			continue;
		}
		const rawPath = line.slice(prefix.length).trim();
		const resolvedPath = inlineEnvironmentVariables(rawPath, environment);
		if (resolvedPath !== rawPath) {
			logger.debug(`Additional classpath with inlined env variables: ${resolvedPath}`);
		}
		entries.push({ rawDirective: line, resolvedPath, exists: probe(resolvedPath) });
	}
	return entries;
}

/**
 * Find the paths a script adds to its classpath.
 * Missing paths are reported through `onError` once each and left out of the result.
 */
export function findClasspathAdditions(
	lines: readonly string[],
	prefix: string,
	environment: Environment,
	onError: (path: string) => void,
	probe: PathProbe = pathExists,
	logger: Logger = noopLogger
): string[] {
	const paths: string[] = [];
	for (const entry of resolveClasspathEntries(lines, prefix, environment, probe, logger)) {
		if (entry.exists) {
			paths.push(entry.resolvedPath);
		} else {
			onError(entry.resolvedPath);
		}
	}
	return paths;
}

/**
 * Convert a `file:` URL to a path; other strings are returned unchanged
 */
export function toFilePath(pathOrUrl: string): string {
	if (pathOrUrl.startsWith("file:")) {
		try {
			return fileURLToPath(pathOrUrl);
		} catch {
			return pathOrUrl;
		}
	}
	return pathOrUrl;
}

/**
 * Split script text into lines, accepting both LF and CRLF endings
 */
export function splitLines(text: string): string[] {
	return text.split(/\r?\n/);
}
