import type { EventMap, TypedEventEmitter } from '../core/events.js'
import { colors, formatTransition } from './ui.js'

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    dispose(): void
}

/** Mirrors engine events onto the CLI spinner and prints tier transitions as they happen. */
export function createProgressTracker(eventBus: TypedEventEmitter, spinner: Spinner, print: (line: string) => void): ProgressTracker {
    const onTaskStart = (data: EventMap['task:start']) => {
        spinner.message(`${colors.task(data.taskId)} ${data.description}`)
    }

    const onTaskEnd = (data: EventMap['task:end']) => {
        const secs = (data.duration / 1000).toFixed(1)
        spinner.message(`${colors.task(data.taskId)} ${data.state} (${secs}s)`)
    }

    const onToolBefore = (data: EventMap['tool:before']) => {
        spinner.message(`${colors.task(data.taskId)} running ${colors.tool(data.toolName)}...`)
    }

    const onTransition = (data: EventMap['protocol:transition']) => {
        print(formatTransition(data))
    }

    const onExplored = (data: EventMap['tot:explored']) => {
        spinner.message(`${colors.task(data.taskId)} exploring alternatives: depth ${data.depth}, ${data.explored} thoughts`)
    }

    eventBus.on('task:start', onTaskStart)
    eventBus.on('task:end', onTaskEnd)
    eventBus.on('tool:before', onToolBefore)
    eventBus.on('protocol:transition', onTransition)
    eventBus.on('tot:explored', onExplored)

    return {
        dispose() {
            eventBus.off('task:start', onTaskStart)
            eventBus.off('task:end', onTaskEnd)
            eventBus.off('tool:before', onToolBefore)
            eventBus.off('protocol:transition', onTransition)
            eventBus.off('tot:explored', onExplored)
        },
    }
}
