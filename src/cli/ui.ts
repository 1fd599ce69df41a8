import pc from 'picocolors'
import type { ProtocolTransition } from '../core/events.js'
import type { GoalState, MissionStatus, ReflexionRecord, Task, TaskState } from '../core/types.js'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    task: (id: number) => pc.cyan(`#${id}`),
    tool: (name: string) => pc.blue(`${name}`),
}

const STATE_COLORS: Record<TaskState, (text: string) => string> = {
    Pending: colors.dim,
    Running: pc.cyan,
    Succeeded: colors.success,
    Failed: colors.error,
    Blocked: colors.warn,
    Cancelled: colors.dim,
}

const STATUS_COLORS: Record<MissionStatus, (text: string) => string> = {
    active: pc.cyan,
    succeeded: colors.success,
    failed: colors.error,
    blocked: colors.warn,
    cancelled: colors.dim,
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatStatus(status: MissionStatus): string {
    return STATUS_COLORS[status](status)
}

export function formatTask(task: Task): string {
    const state = STATE_COLORS[task.state](task.state.padEnd(9))
    const extra: string[] = []
    if (task.kind !== 'planned') extra.push(`${task.kind} for #${task.parentTaskId ?? '?'}`)
    if (task.retryCount > 0) extra.push(`retries ${task.retryCount}`)
    if (task.blockedReason) extra.push(task.blockedReason)
    const suffix = extra.length > 0 ? colors.dim(` (${extra.join(', ')})`) : ''
    return `${colors.task(task.id)} ${state} ${task.description}${suffix}`
}

export function formatTransition(t: ProtocolTransition): string {
    const detail = t.detail ? colors.dim(` ${t.detail}`) : ''
    return `${colors.task(t.taskId)} ${t.tier} ${colors.bold(t.state)}${detail}`
}

export function formatRecord(record: ReflexionRecord): string {
    const score = record.evaluationScore.toFixed(2)
    return [
        `${colors.dim(record.timestamp)} ${colors.task(record.taskId)} ${colors.bold(record.category)} ${colors.tool(record.action)} ${colors.dim(`score ${score}`)}`,
        `  ${record.reflectionText.split('\n').join('\n  ')}`,
    ].join('\n')
}

export function formatProgress(goal: GoalState): string {
    const done = goal.checklist.filter((c) => c.done).length
    return `${done}/${goal.checklist.length}`
}
