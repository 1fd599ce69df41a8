import type { CapabilityRegistry } from '../capabilities/registry.js'
import type { ToolGateway } from './gateway.js'
import { readFileTool } from './filesystem/read.js'
import { writeFileTool } from './filesystem/write.js'
import { ToolRegistry } from './registry.js'
import { shellTool } from './shell/shell.js'
import type { AnyTool } from './types.js'
import { httpGetTool } from './web/web-fetch.js'

/** Confidence a freshly discovered tool starts with: trusted enough to use, low enough to be verified first. */
export const DISCOVERY_CONFIDENCE = 0.4

export function createToolRegistry(): ToolRegistry {
    const registry = new ToolRegistry()
    registry.register(shellTool)
    registry.register(readFileTool)
    registry.register(writeFileTool)
    registry.register(httpGetTool)
    return registry
}

export function registerCapability(
    capabilities: CapabilityRegistry,
    tools: ToolRegistry,
    gateway: ToolGateway,
    tool: AnyTool,
    confidence = DISCOVERY_CONFIDENCE
): void {
    if (!tools.has(tool.name)) tools.register(tool)
    capabilities.register(
        {
            toolName: tool.name,
            description: tool.description,
            invocationSchema: tools.invocationSchema(tool.name),
            confidenceScore: confidence,
            verifiedAt: null,
        },
        () => gateway.healthCheck(tool.name)
    )
}

export function discoverCapabilities(capabilities: CapabilityRegistry, tools: ToolRegistry, gateway: ToolGateway): void {
    for (const tool of tools.listAll()) {
        if (!capabilities.has(tool.name)) registerCapability(capabilities, tools, gateway, tool)
    }
}
