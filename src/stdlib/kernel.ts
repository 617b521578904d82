// SPDX-License-Identifier: MIT
// Settle Kernel Registry
// Every native operator the evaluator can dispatch to.

import { createCoreRegistry } from "../domains/core.js";
import { mergeRegistries, type OperatorRegistry } from "../domains/registry.js";
import { createSetRegistry } from "../domains/set.js";

export function createKernelRegistry(): OperatorRegistry {
	return mergeRegistries(createCoreRegistry(), createSetRegistry());
}
