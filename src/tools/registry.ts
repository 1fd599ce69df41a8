import { zodToJsonSchema } from 'zod-to-json-schema'
import type { AnyTool } from './types.js'

/** Implementations behind the gateway. What the agent believes it can do lives in the CapabilityRegistry. */
export class ToolRegistry {
    private tools = new Map<string, AnyTool>()
    private schemaCache = new Map<string, Record<string, unknown>>()

    register(tool: AnyTool): void {
        this.tools.set(tool.name, tool)
        this.schemaCache.delete(tool.name)
    }

    get(name: string): AnyTool | undefined {
        return this.tools.get(name)
    }

    has(name: string): boolean {
        return this.tools.has(name)
    }

    invocationSchema(name: string): Record<string, unknown> {
        const cached = this.schemaCache.get(name)
        if (cached) return cached

        const tool = this.tools.get(name)
        if (!tool) return {}
        const schema: Record<string, unknown> = { ...zodToJsonSchema(tool.parameters) }
        this.schemaCache.set(name, schema)
        return schema
    }

    listAll(): AnyTool[] {
        return [...this.tools.values()]
    }
}
