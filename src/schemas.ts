// SPDX-License-Identifier: MIT
// Settle JSON Schemas
// Generated from Zod schemas via z.toJSONSchema()

import { z } from "zod/v4";
import { ProgramSchema } from "./zod-schemas.js";

//==============================================================================
// Generated JSON Schemas
//==============================================================================

export const programJsonSchema = z.toJSONSchema(ProgramSchema, { target: "draft-07" });

//==============================================================================
// Schema Type Guards
//==============================================================================

export function isProgramSchema(obj: unknown): obj is Record<string, unknown> {
	return typeof obj === "object" && obj !== null && "$schema" in obj && "description" in obj && obj.description === "SettleProgram";
}
