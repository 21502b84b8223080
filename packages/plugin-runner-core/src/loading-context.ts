import { readFileSync, readdirSync, statSync } from "node:fs";
import { createRequire, isBuiltin } from "node:module";
import { basename, dirname, extname, isAbsolute, join, resolve as resolvePath } from "node:path";
import { toFilePath } from "./classpath-resolver";
import { LoadingContextError, errorMessage } from "./errors";
import { createModuleFunction, type ModuleFunction, type ModuleRecord } from "./module-function";
import { ScriptCompiler, getLoaderForPath } from "./script-compiler";
import { noopLogger, type Logger, type RequireFn, type ScriptLoaderType } from "./types";

const MODULE_EXTENSIONS = [".ts", ".tsx", ".js", ".cjs", ".json"];

/**
 * A location modules can be resolved from
 */
export type SearchRoot =
	| { kind: "directory"; path: string }
	| { kind: "module"; name: string; path: string };

type Resolution =
	| { kind: "file"; path: string }
	| { kind: "parent"; id: string };

/**
 * Options for building a loading context
 */
export interface LoadingContextOptions {
	/** Loader of the host itself; consulted after every search root */
	parentRequire?: RequireFn;
	/** Compiler for script modules; a fresh one is created when omitted */
	compiler?: ScriptCompiler;
	logger?: Logger;
}

/**
 * Default parent: the engine module's own loader, independent of the working directory
 */
export function defaultParentRequire(): RequireFn {
	return createRequire(__filename);
}

/**
 * Build an isolated loading context from ordered search paths.
 *
 * `file:` URLs are converted to paths; other paths are made absolute.
 * Directories become directory roots, single files become modules named after the file.
 * Paths that do not exist are skipped with a warning.
 *
 * @throws LoadingContextError when a path exists but cannot be read
 */
export function createLoadingContext(paths: readonly string[], options: LoadingContextOptions = {}): LoadingContext {
	const logger = options.logger ?? noopLogger;
	const roots: SearchRoot[] = [];

	for (const rawPath of paths) {
		const path = normalizeSearchPath(rawPath);
		const root = enumerateSearchPath(path, logger);
		if (root) {
			roots.push(root);
		}
	}

	return new LoadingContext(
		roots,
		options.parentRequire ?? defaultParentRequire(),
		options.compiler ?? new ScriptCompiler(),
		logger
	);
}

/**
 * Absolute local path for a search path given as a path or a `file:` URL
 */
export function normalizeSearchPath(pathOrUrl: string): string {
	return resolvePath(toFilePath(pathOrUrl));
}

function enumerateSearchPath(path: string, logger: Logger): SearchRoot | null {
	let isDirectory: boolean;
	try {
		isDirectory = statSync(path).isDirectory();
	} catch (error) {
		const code = errorCode(error);
		if (code === "ENOENT" || code === "ENOTDIR") {
			logger.warn(`Skipping missing search path: ${path}`);
			return null;
		}
		throw new LoadingContextError(`Cannot read '${path}'. ${errorMessage(error)}`, path, error);
	}

	if (!isDirectory) {
		return { kind: "module", name: moduleNameOf(path), path };
	}

	try {
		readdirSync(path);
	} catch (error) {
		throw new LoadingContextError(`Cannot list '${path}'. ${errorMessage(error)}`, path, error);
	}
	return { kind: "directory", path };
}

function moduleNameOf(filePath: string): string {
	const name = basename(filePath);
	const extension = extname(name);
	return extension ? name.slice(0, -extension.length) : name;
}

function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

/**
 * Isolated module resolution scope for one plugin run.
 *
 * Modules are looked up in the search roots in order, then in the parent.
 * Everything loaded from the roots is cached here only, so two contexts never
 * share module instances. Relative specifiers resolve against the requiring file.
 */
export class LoadingContext {
	private readonly roots: readonly SearchRoot[];
	private readonly parentRequire: RequireFn;
	private readonly compiler: ScriptCompiler;
	private readonly logger: Logger;
	private moduleCache: Map<string, ModuleRecord> = new Map();
	private disposed = false;

	constructor(roots: readonly SearchRoot[], parentRequire: RequireFn, compiler: ScriptCompiler, logger: Logger = noopLogger) {
		this.roots = roots;
		this.parentRequire = parentRequire;
		this.compiler = compiler;
		this.logger = logger;
	}

	/**
	 * Search roots in lookup order
	 */
	getSearchRoots(): readonly SearchRoot[] {
		return this.roots;
	}

	/**
	 * Paths of the modules loaded through this context so far
	 */
	getLoadedModules(): string[] {
		return Array.from(this.moduleCache.keys());
	}

	isDisposed(): boolean {
		return this.disposed;
	}

	/**
	 * Resolve a specifier as seen from a file.
	 * @returns an absolute file path, a parent-resolved id, or null when nothing matches
	 */
	resolve(specifier: string, fromFile: string): string | null {
		const resolution = this.resolveSpecifier(specifier, fromFile);
		if (!resolution) {
			return null;
		}
		return resolution.kind === "file" ? resolution.path : resolution.id;
	}

	/**
	 * Load a module as seen from a file
	 * @throws Error when the module cannot be resolved or fails while evaluating
	 */
	require(specifier: string, fromFile: string): unknown {
		this.assertNotDisposed();
		const resolution = this.resolveSpecifier(specifier, fromFile);
		if (!resolution) {
			throw new Error(`Cannot find module '${specifier}' from '${fromFile}'`);
		}
		if (resolution.kind === "parent") {
			return this.parentRequire(specifier);
		}
		return this.loadFile(resolution.path);
	}

	/**
	 * `require` function scoped to a file, as injected into compiled code
	 */
	createRequire(fromFile: string): RequireFn {
		const localRequire = (id: string): unknown => this.require(id, fromFile);
		return Object.assign(localRequire, {
			resolve: (id: string): string => {
				const resolved = this.resolve(id, fromFile);
				if (resolved === null) {
					throw new Error(`Cannot find module '${id}' from '${fromFile}'`);
				}
				return resolved;
			},
		});
	}

	/**
	 * Compile a script and wrap it in a function scope without evaluating it
	 * @throws ScriptCompilationError
	 */
	compileScript(filePath: string, source: string, loader: ScriptLoaderType, variableNames: readonly string[] = []): ModuleFunction & { code: string } {
		const code = this.compiler.compile(filePath, source, loader);
		return { ...createModuleFunction(code, filePath, variableNames), code };
	}

	/**
	 * Cache a module evaluated outside the context, such as the entry script,
	 * so that requiring its file returns the same exports
	 */
	registerModule(filePath: string, module: ModuleRecord): void {
		this.assertNotDisposed();
		this.moduleCache.set(resolvePath(filePath), module);
	}

	/**
	 * Drop every cached module. The context cannot load anything afterwards.
	 */
	dispose(): void {
		this.moduleCache.clear();
		this.disposed = true;
	}

	private loadFile(filePath: string): unknown {
		const cached = this.moduleCache.get(filePath);
		if (cached) {
			return cached.exports;
		}

		if (filePath.toLowerCase().endsWith(".json")) {
			const module: ModuleRecord = { exports: JSON.parse(readFileSync(filePath, "utf8")) };
			this.moduleCache.set(filePath, module);
			return module.exports;
		}

		const loader = getLoaderForPath(filePath);
		if (!loader) {
			throw new Error(`Unsupported module type: ${filePath}`);
		}

		const source = readFileSync(filePath, "utf8");
		const moduleFunction = this.compileScript(filePath, source, loader);
		const module: ModuleRecord = { exports: {} };
		// cached before evaluation so circular requires see partial exports
		this.moduleCache.set(filePath, module);
		try {
			moduleFunction.invoke({
				module,
				require: this.createRequire(filePath),
				dirname: dirname(filePath),
			});
		} catch (error) {
			this.moduleCache.delete(filePath);
			throw error;
		}
		this.logger.debug(`Loaded module ${filePath}`);
		return module.exports;
	}

	private resolveSpecifier(specifier: string, fromFile: string): Resolution | null {
		if (isBuiltin(specifier)) {
			return { kind: "parent", id: specifier };
		}

		if (isRelativeSpecifier(specifier) || isAbsolute(specifier)) {
			const found = findFile(resolvePath(dirname(fromFile), specifier));
			return found ? { kind: "file", path: found } : null;
		}

		for (const root of this.roots) {
			const found = root.kind === "module"
				? (root.name === specifier ? root.path : null)
				: findFile(join(root.path, specifier)) ?? findFile(join(root.path, "node_modules", specifier));
			if (found) {
				return { kind: "file", path: found };
			}
		}

		try {
			return { kind: "parent", id: this.parentRequire.resolve(specifier) };
		} catch {
			return null;
		}
	}

	private assertNotDisposed(): void {
		if (this.disposed) {
			throw new Error("Loading context has been disposed");
		}
	}
}

function isRelativeSpecifier(specifier: string): boolean {
	return specifier === "." || specifier === ".." || specifier.startsWith("./") || specifier.startsWith("../");
}

function isFile(path: string): boolean {
	return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isDirectory(path: string): boolean {
	return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * File a module path points at: the path itself, the path plus a known extension,
 * a package `main`, or an index file
 */
function findFile(base: string): string | null {
	if (isFile(base)) {
		return base;
	}
	for (const extension of MODULE_EXTENSIONS) {
		if (isFile(base + extension)) {
			return base + extension;
		}
	}
	if (!isDirectory(base)) {
		return null;
	}

	const main = readPackageMain(base);
	if (main) {
		const target = resolvePath(base, main);
		if (target !== base) {
			const found = findFile(target);
			if (found) {
				return found;
			}
		}
	}
	for (const extension of MODULE_EXTENSIONS) {
		const index = join(base, `index${extension}`);
		if (isFile(index)) {
			return index;
		}
	}
	return null;
}

function readPackageMain(directory: string): string | null {
	const manifestPath = join(directory, "package.json");
	if (!isFile(manifestPath)) {
		return null;
	}
	try {
		const manifest: unknown = JSON.parse(readFileSync(manifestPath, "utf8"));
		if (manifest && typeof manifest === "object" && "main" in manifest && typeof manifest.main === "string") {
			return manifest.main;
		}
	} catch {
		return null;
	}
	return null;
}
