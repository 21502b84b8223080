import { transform } from "sucrase";
import { ScriptCompilationError, errorMessage } from "./errors";
import type { ScriptLoaderType } from "./types";

const TRANSFORMS: Record<ScriptLoaderType, Array<"typescript" | "jsx" | "imports">> = {
	js: ["imports"],
	ts: ["typescript", "imports"],
	tsx: ["typescript", "jsx", "imports"],
};

/**
 * Compiles TypeScript/JavaScript sources to CommonJS.
 * Uses Sucrase for fast compilation without type checking.
 *
 * One compiler belongs to one loading context, so nothing compiled here
 * outlives the plugin run that asked for it.
 */
export class ScriptCompiler {
	private compiledCount = 0;

	/**
	 * Compile a script source to JavaScript
	 * @param path - Script file path (used in error messages)
	 * @param loader - Script type (js, ts or tsx)
	 * @throws ScriptCompilationError when Sucrase rejects the source
	 */
	compile(path: string, source: string, loader: ScriptLoaderType): string {
		const transforms = TRANSFORMS[loader];

		try {
			const result = transform(source, {
				filePath: path,
				transforms,
			});
			this.compiledCount++;
			return result.code;
		} catch (error) {
			throw new ScriptCompilationError(errorMessage(error), path, error);
		}
	}

	/**
	 * Number of sources compiled so far
	 */
	count(): number {
		return this.compiledCount;
	}
}

/**
 * Loader type for a file path, or null when the file is not a script
 */
export function getLoaderForPath(filePath: string): ScriptLoaderType | null {
	const lowerPath = filePath.toLowerCase();
	if (lowerPath.endsWith(".d.ts")) {
		return null;
	}
	if (lowerPath.endsWith(".ts")) {
		return "ts";
	}
	if (lowerPath.endsWith(".tsx")) {
		return "tsx";
	}
	if (lowerPath.endsWith(".js") || lowerPath.endsWith(".cjs")) {
		return "js";
	}
	return null;
}
