import { ModelConfig } from "../config/agent-config.js";
import { AlreadyRegisteredError, InitError } from "../types/errors.js";
import { Logger } from "../utils/logger.js";
import { ModelBackend } from "./model-backend.js";

export interface BackendFactoryContext {
    logger?: Logger;
}

export interface BackendRegistration {
    name: string;
    create: (config: ModelConfig, context: BackendFactoryContext) => ModelBackend;
    description?: string;
}

export class BackendRegistry {
    private registrations = new Map<string, BackendRegistration>();

    register(registration: BackendRegistration): void {
        if (this.registrations.has(registration.name)) {
            throw new AlreadyRegisteredError(registration.name, "Backend");
        }
        this.registrations.set(registration.name, registration);
    }

    unregister(name: string): boolean {
        return this.registrations.delete(name);
    }

    has(name: string): boolean {
        return this.registrations.has(name);
    }

    list(): BackendRegistration[] {
        return Array.from(this.registrations.values());
    }

    create(config: ModelConfig, context: BackendFactoryContext = {}): ModelBackend {
        const registration = this.registrations.get(config.provider);
        if (!registration) {
            throw new InitError(`Backend not registered: ${config.provider}`);
        }
        return registration.create(config, context);
    }
}
