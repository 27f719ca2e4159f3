import { z } from "zod";
import { ToolParams } from "../types/messages.js";
import { ValidationError } from "../types/errors.js";

export interface CapabilityContext {
    signal?: AbortSignal;
    /** Internal session the invoking turn belongs to, when there is one. */
    sessionId?: string;
}

/**
 * A named callable unit the model can ask for.
 * `execute` resolves with any value or throws; the engine turns both into text.
 */
export interface Capability {
    readonly name: string;
    readonly description: string;
    execute(params: ToolParams, context?: CapabilityContext): Promise<unknown>;
}

export interface CapabilityDefinition<T> {
    name: string;
    description: string;
    parameters: z.ZodType<T, z.ZodTypeDef, unknown>;
    run: (args: T, context: CapabilityContext) => Promise<unknown>;
}

/**
 * Builds a capability whose parameters are checked against a zod schema
 * before `run` sees them. Schema failures surface as ValidationError.
 */
export function defineCapability<T>(definition: CapabilityDefinition<T>): Capability {
    return {
        name: definition.name,
        description: definition.description,
        async execute(params: ToolParams, context: CapabilityContext = {}): Promise<unknown> {
            const parsed = definition.parameters.safeParse(params);
            if (!parsed.success) {
                const issues = parsed.error.issues
                    .map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`)
                    .join("; ");
                throw new ValidationError(`Invalid parameters for ${definition.name}: ${issues}`, {
                    details: { tool: definition.name }
                });
            }
            return definition.run(parsed.data, context);
        }
    };
}
