// SPDX-License-Identifier: MIT
// Settle Environments
// The value and type namespaces, plus overlay scopes for comprehensions.

import type { TypeShape, Value } from "./types.js";

//==============================================================================
// Value Environment (ρ)
//==============================================================================

/**
 * A scope: its own bindings layered over an optional parent. Lookups walk
 * outwards, so inner bindings shadow outer ones; extending never mutates the
 * parent.
 */
export interface ValueEnv {
	readonly bindings: ReadonlyMap<string, Value>;
	readonly parent?: ValueEnv | undefined;
}

export function emptyValueEnv(): ValueEnv {
	return { bindings: new Map() };
}

export function extendValueEnv(env: ValueEnv, name: string, value: Value): ValueEnv {
	return { bindings: new Map([[name, value]]), parent: env };
}

export function extendValueEnvMany(
	env: ValueEnv,
	entries: Iterable<readonly [string, Value]>,
): ValueEnv {
	return { bindings: new Map(entries), parent: env };
}

export function lookupValue(env: ValueEnv, name: string): Value | undefined {
	for (let scope: ValueEnv | undefined = env; scope; scope = scope.parent) {
		const value = scope.bindings.get(name);
		if (value !== undefined) return value;
	}
	return undefined;
}

//==============================================================================
// Type Environment
//==============================================================================

export type TypeEnv = ReadonlyMap<string, TypeShape>;

export function lookupType(env: TypeEnv, name: string): TypeShape | undefined {
	return env.get(name);
}

//==============================================================================
// Program Environment
//==============================================================================

/**
 * The two namespaces a program run owns. Declarations write here; nothing
 * else does.
 */
export interface Environment {
	readonly values: Map<string, Value>;
	readonly types: Map<string, TypeShape>;
	/** Declared type name of each value binding that had one */
	readonly valueTypes: Map<string, string>;
}

export function createEnvironment(): Environment {
	return { values: new Map(), types: new Map(), valueTypes: new Map() };
}

/** Root scope reading the live value namespace. */
export function globalScope(env: Environment): ValueEnv {
	return { bindings: env.values };
}

export function defineValue(env: Environment, name: string, value: Value, typeName?: string): void {
	env.values.set(name, value);
	if (typeName === undefined) env.valueTypes.delete(name);
	else env.valueTypes.set(name, typeName);
}

export function defineType(env: Environment, name: string, shape: TypeShape): void {
	env.types.set(name, shape);
}
