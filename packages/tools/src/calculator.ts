import { z } from "zod";
import { Capability, ExecutionError, defineCapability } from "@parley/core";

const calculatorParams = z.object({
    operation: z.enum(["add", "subtract", "multiply", "divide"]),
    a: z.coerce.number().finite(),
    b: z.coerce.number().finite()
});

export type CalculatorParams = z.infer<typeof calculatorParams>;

export function calculate({ operation, a, b }: CalculatorParams): number {
    switch (operation) {
        case "add":
            return a + b;
        case "subtract":
            return a - b;
        case "multiply":
            return a * b;
        case "divide":
            if (b === 0) {
                throw new ExecutionError("Division by zero");
            }
            return a / b;
    }
}

export const calculatorTool = (): Capability => defineCapability({
    name: "calculator",
    description:
        'Basic arithmetic. Parameters: operation ("add" | "subtract" | "multiply" | "divide"), a (number), b (number).',
    parameters: calculatorParams,
    run: async (args) => calculate(args)
});
