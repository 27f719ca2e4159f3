import { Capability, CapabilityContext } from "./capability.js";
import { ToolParams } from "../types/messages.js";
import { AlreadyRegisteredError, NotFoundError } from "../types/errors.js";

export interface CapabilitySummary {
    name: string;
    description: string;
}

export class CapabilityRegistry {
    private capabilities = new Map<string, Capability>();

    register(name: string, capability: Capability): void {
        if (this.capabilities.has(name)) {
            throw new AlreadyRegisteredError(name);
        }
        this.capabilities.set(name, capability);
    }

    /**
     * Registers under the capability's own name.
     */
    add(capability: Capability): void {
        this.register(capability.name, capability);
    }

    has(name: string): boolean {
        return this.capabilities.has(name);
    }

    get(name: string): Capability | undefined {
        return this.capabilities.get(name);
    }

    list(): CapabilitySummary[] {
        return Array.from(this.capabilities.entries()).map(([name, capability]) => ({
            name,
            description: capability.description
        }));
    }

    get size(): number {
        return this.capabilities.size;
    }

    /**
     * Forwards to the named capability and hands back whatever it resolves or throws.
     * The lookup happens before the first await, so registrations made while the
     * capability runs cannot change which one is executing.
     */
    async invoke(name: string, params: ToolParams, context: CapabilityContext = {}): Promise<unknown> {
        const capability = this.capabilities.get(name);
        if (!capability) {
            throw new NotFoundError(`Capability not found: ${name}`, { details: { name } });
        }
        return capability.execute(params, context);
    }
}
