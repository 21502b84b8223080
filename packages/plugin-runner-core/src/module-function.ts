import { ScriptCompilationError, errorMessage } from "./errors";
import type { RequireFn } from "./types";

const BASE_PARAMS = ["module", "exports", "require", "__filename", "__dirname"];
const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * CommonJS-style module record passed into compiled code
 */
export interface ModuleRecord {
	exports: unknown;
}

/**
 * Values a module function is invoked with
 */
export interface ModuleScope {
	module: ModuleRecord;
	require: RequireFn;
	dirname: string;
	/** Extra variables, looked up by the names the function was created with */
	variables?: Readonly<Record<string, unknown>>;
}

/**
 * Compiled code wrapped in a function scope, ready to be evaluated
 */
export interface ModuleFunction {
	readonly filePath: string;
	readonly variableNames: readonly string[];
	invoke(scope: ModuleScope): void;
}

/**
 * Whether a name can be injected as a function parameter
 */
export function isInjectableName(name: string): boolean {
	return IDENTIFIER_PATTERN.test(name) && !BASE_PARAMS.includes(name);
}

/**
 * Wrap compiled code in a function scope with CommonJS parameters plus the given variable names.
 *
 * Security Note: this uses the Function constructor to evaluate user-provided scripts.
 * Scripts should only be loaded from trusted sources.
 *
 * @throws ScriptCompilationError when the code is not valid JavaScript
 */
export function createModuleFunction(
	code: string,
	filePath: string,
	variableNames: readonly string[] = []
): ModuleFunction {
	const invalid = variableNames.filter((name) => !isInjectableName(name));
	if (invalid.length > 0) {
		throw new ScriptCompilationError(`Invalid variable names: ${invalid.join(", ")}`, filePath);
	}

	// eslint-disable-next-line @typescript-eslint/no-unsafe-function-type
	let runner: Function;
	try {
		// eslint-disable-next-line @typescript-eslint/no-implied-eval
		runner = new Function(...BASE_PARAMS, ...variableNames, code);
	} catch (error) {
		throw new ScriptCompilationError(errorMessage(error), filePath, error);
	}

	return {
		filePath,
		variableNames,
		invoke(scope: ModuleScope): void {
			const variables = scope.variables ?? {};
			const baseArgs: unknown[] = [scope.module, scope.module.exports, scope.require, filePath, scope.dirname];
			const variableArgs = variableNames.map((name) => variables[name]);
			runner(...baseArgs, ...variableArgs);
		},
	};
}

/**
 * Static `require("...")` specifiers in compiled code, in order of appearance, without duplicates
 */
export function extractRequireSpecifiers(code: string): string[] {
	const matches = code.matchAll(/\brequire\s*\(\s*["']([^"']+)["']\s*\)/g);
	const specifiers: string[] = [];
	for (const match of matches) {
		if (match[1] && !specifiers.includes(match[1])) {
			specifiers.push(match[1]);
		}
	}
	return specifiers;
}
