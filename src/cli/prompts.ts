import * as clack from '@clack/prompts'
import type { Resolution, Task } from '../core/types.js'

/** Null when the operator backs out. */
export async function askResolution(task: Task): Promise<Resolution | null> {
    const choice = await clack.select({
        message: `Task #${task.id} is blocked (${task.blockedReason ?? task.state}). How should it be resolved?`,
        options: [
            { value: 'observation', label: 'Mark done', hint: 'record the outcome you observed' },
            { value: 'cancel', label: 'Cancel the task' },
        ],
    })
    if (clack.isCancel(choice)) return null
    if (choice === 'cancel') return { kind: 'cancel' }

    const output = await clack.text({
        message: 'What was the outcome?',
        placeholder: 'e.g. installed the dependency by hand',
        validate(value) {
            if (!value.trim()) return 'Describe the outcome'
        },
    })
    if (clack.isCancel(output)) return null
    return { kind: 'observation', output }
}

export async function confirmAction(message: string): Promise<boolean> {
    const result = await clack.confirm({ message })
    if (clack.isCancel(result)) return false
    return result
}
