import path from 'node:path'
import { CapabilityRegistry } from '../capabilities/registry.js'
import type { ResolvedConfig } from '../config/schema.js'
import { MissionRunner } from '../engine/mission-runner.js'
import { Planner } from '../engine/plan/planner.js'
import { MetaCognitionTier } from '../engine/protocol/meta-cognition-tier.js'
import { ProtocolEngine } from '../engine/protocol/protocol-engine.js'
import { ReflexionTier } from '../engine/protocol/reflexion-tier.js'
import { TransitionRecorder } from '../engine/protocol/transitions.js'
import { ReActExecutor } from '../engine/react-executor.js'
import { CritiqueEvaluator } from '../engine/reflexion/critique-evaluator.js'
import { ReflexionEvaluator } from '../engine/reflexion/evaluator.js'
import { ShellEvaluator } from '../engine/reflexion/shell-evaluator.js'
import { TestRunnerEvaluator } from '../engine/reflexion/test-runner-evaluator.js'
import { ToTEngine } from '../engine/tot-engine.js'
import {
    CompositeEscalationChannel,
    FileEscalationChannel,
    type HumanEscalationChannel,
    LoggingEscalationChannel,
} from '../escalation/channel.js'
import { createLLMClient } from '../llm/client.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { ContextCurator } from '../memory/context-curator.js'
import { EpisodicMemory } from '../memory/episodic-memory.js'
import { GoalStateManager } from '../memory/goal-state.js'
import { KnowledgeBaseStore } from '../memory/knowledge-base.js'
import { MissionStore } from '../memory/mission-store.js'
import { LLMReasoningModel } from '../reasoning/llm-reasoning-model.js'
import { LLMResearchCollaborator } from '../reasoning/research.js'
import type { ReasoningModel, ResearchCollaborator } from '../reasoning/types.js'
import { ToolGateway } from '../tools/gateway.js'
import type { ToolRegistry } from '../tools/registry.js'
import { createToolRegistry, discoverCapabilities } from '../tools/setup.js'
import { MetricsCollector } from '../tracing/metrics.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    stateRoot: string
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    llmClient: LLMClient
    tools: ToolRegistry
    capabilities: CapabilityRegistry
    gateway: ToolGateway
    knowledgeBase: KnowledgeBaseStore
    memory: EpisodicMemory
    goals: GoalStateManager
    missionStore: MissionStore
    reasoning: ReasoningModel
    runner: MissionRunner
    metricsCollector: MetricsCollector
    initialize(): Promise<void>
    shutdown(): Promise<void>
}

/** Collaborators a caller may supply instead of the defaults, e.g. scripted models in tests. */
export interface ContainerOverrides {
    fs?: FileSystem
    logger?: Logger
    llmClient?: LLMClient
    tools?: ToolRegistry
    reasoning?: ReasoningModel
    research?: ResearchCollaborator
    escalation?: HumanEscalationChannel
    now?: () => Date
    newId?: () => string
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const now = overrides.now ?? (() => new Date())
    const stateRoot = path.resolve(config.projectDir, config.stateDir)

    const llmClient = overrides.llmClient ?? createLLMClient(config, logger, eventBus)
    const tools = overrides.tools ?? createToolRegistry()
    const capabilities = new CapabilityRegistry(logger, now)
    const gateway = new ToolGateway({
        tools,
        capabilities,
        permissions: config.permissions,
        verifyThreshold: config.capabilities.verifyThreshold,
        fs,
        cwd: config.projectDir,
        eventBus,
        logger,
    })

    const knowledgeBase = new KnowledgeBaseStore(fs, stateRoot, eventBus, logger, now)
    const memory = new EpisodicMemory(fs, stateRoot, logger)
    const goals = new GoalStateManager(fs, stateRoot, logger)
    const missionStore = new MissionStore(fs, stateRoot, logger)
    const curator = new ContextCurator({
        goals,
        capabilities,
        knowledgeBase,
        memory,
        fs,
        cwd: config.projectDir,
        topK: config.context.topK,
        logger,
    })

    const reasoning = overrides.reasoning ?? new LLMReasoningModel(llmClient)
    const research = overrides.research ?? new LLMResearchCollaborator(llmClient, gateway, config.toolTimeoutMs, logger)
    const escalation =
        overrides.escalation ??
        new CompositeEscalationChannel([new LoggingEscalationChannel(logger), new FileEscalationChannel(fs, stateRoot, now)])

    const evaluator = new ReflexionEvaluator({
        evaluators: [new TestRunnerEvaluator(), new ShellEvaluator(), new CritiqueEvaluator(reasoning)],
        memory,
        capabilities,
        config: config.capabilities,
        logger,
        now,
    })
    const transitions = new TransitionRecorder(eventBus, logger, now)
    const engine = new ProtocolEngine({
        react: new ReActExecutor({ model: reasoning, gateway, evaluator, toolTimeoutMs: config.toolTimeoutMs, logger }),
        tot: new ToTEngine({ model: reasoning, eventBus, logger }),
        curator,
        capabilities,
        reflexion: new ReflexionTier({ model: reasoning, memory, transitions, config: config.protocol, logger, now }),
        metaCognition: new MetaCognitionTier({
            model: reasoning,
            research,
            knowledgeBase,
            memory,
            transitions,
            config: config.protocol,
            logger,
            now,
        }),
        memory,
        escalation,
        transitions,
        eventBus,
        logger,
        config,
        now,
    })
    const runner = new MissionRunner({
        planner: new Planner(reasoning, capabilities, logger),
        engine,
        store: missionStore,
        goals,
        memory,
        eventBus,
        logger,
        maxConcurrentTasks: config.maxConcurrentTasks,
        now,
        newId: overrides.newId,
    })
    const metricsCollector = new MetricsCollector(eventBus)

    return {
        config,
        stateRoot,
        logger,
        eventBus,
        fs,
        llmClient,
        tools,
        capabilities,
        gateway,
        knowledgeBase,
        memory,
        goals,
        missionStore,
        reasoning,
        runner,
        metricsCollector,

        async initialize() {
            const restored = await memory.load()
            discoverCapabilities(capabilities, tools, gateway)
            logger.debug({ restored, capabilities: capabilities.list().length }, 'container:initialized')
        },

        async shutdown() {
            metricsCollector.dispose()
            eventBus.removeAll()
        },
    }
}
