import * as clack from '@clack/prompts'
import { Command, InvalidArgumentError } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { type Container, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import type { MissionReport } from '../engine/mission-runner.js'
import { createProgressTracker } from './progress.js'
import { askResolution, confirmAction } from './prompts.js'
import { colors, formatError, formatProgress, formatRecord, formatStatus, formatTask } from './ui.js'

interface GlobalOptions {
    model?: string
    key?: string
    debug?: boolean
    stateDir?: string
}

interface RunOptions {
    concurrency?: number
    maxRetries?: number
}

function nonNegativeInt(value: string): number {
    const parsed = Number.parseInt(value, 10)
    if (!Number.isInteger(parsed) || parsed < 0) throw new InvalidArgumentError('Expected a non-negative integer.')
    return parsed
}

function parseTaskId(value: string): number {
    const parsed = Number.parseInt(value, 10)
    if (!Number.isInteger(parsed) || parsed < 1) throw new InvalidArgumentError('Expected a task id.')
    return parsed
}

async function openContainer(options: GlobalOptions, extra: Config = {}): Promise<Container> {
    const fs = new NodeFileSystem()
    const config = await loadConfig({
        fs,
        cliFlags: {
            ...extra,
            model: options.model,
            apiKey: options.key,
            stateDir: options.stateDir,
            logLevel: options.debug ? 'debug' : undefined,
        },
        onInvalid: (file, error) => console.error(colors.warn(`Ignoring invalid config ${file}: ${errorMessage(error)}`)),
    })
    const container = createContainer(config)
    await container.initialize()
    return container
}

function printReport(report: MissionReport): void {
    console.log(`\n${colors.bold('Mission')} ${report.missionId} ${formatStatus(report.status)}`)
    if (report.error) console.log(formatError(report.error))
    for (const task of report.tasks) console.log(`  ${formatTask(task)}`)
    if (report.blocked.length > 0) {
        console.log(colors.warn(`\n${report.blocked.length} task(s) need an operator decision:`))
        for (const b of report.blocked) {
            console.log(`  recourse resolve ${report.missionId} ${b.taskId}  ${colors.dim(b.reason)}`)
        }
    }
    if (report.failed.length > 0) {
        console.log(colors.warn(`\n${report.failed.length} task(s) stopped on an error; retry with recourse resume ${report.missionId}`))
        for (const f of report.failed) console.log(`  task ${f.taskId}  ${colors.dim(f.detail)}`)
    }
}

/** Runs the mission with a spinner; Ctrl+C cancels it cleanly. */
async function drive(container: Container, run: () => Promise<MissionReport>, missionIdHint?: string): Promise<MissionReport> {
    const spinner = clack.spinner()
    spinner.start('Planning...')
    const tracker = createProgressTracker(container.eventBus, spinner, (line) => console.log(`\n${line}`))

    let missionId = missionIdHint
    const onStart = ({ missionId: id }: { missionId: string }) => {
        missionId = id
    }
    container.eventBus.on('mission:start', onStart)
    const onInterrupt = () => {
        if (missionId) container.runner.cancel(missionId)
    }
    process.on('SIGINT', onInterrupt)

    try {
        const report = await run()
        spinner.stop(`Mission ${formatStatus(report.status)}`)
        return report
    } catch (error) {
        spinner.stop(colors.error('Mission aborted'))
        throw error
    } finally {
        process.off('SIGINT', onInterrupt)
        container.eventBus.off('mission:start', onStart)
        tracker.dispose()
        console.log(colors.dim(container.metricsCollector.formatStatus()))
        await container.shutdown()
    }
}

function exitOnError<A extends unknown[]>(action: (...args: A) => Promise<void>) {
    return async (...args: A) => {
        try {
            await action(...args)
        } catch (error) {
            console.error(formatError(errorMessage(error)))
            process.exitCode = 1
        }
    }
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('recourse')
        .description('Autonomous mission runner with self-correcting escalation')
        .version('0.1.0')
        .option('-m, --model <model>', 'LLM model to use')
        .option('-k, --key <key>', 'API key for the OpenAI-compatible endpoint')
        .option('--state-dir <dir>', 'State directory, relative to the project')
        .option('--debug', 'Enable debug logging')

    program
        .command('run')
        .description('Plan and execute a mission from a prime directive')
        .argument('<directive>', 'What the mission should achieve')
        .option('-c, --concurrency <n>', 'Tasks run at once', nonNegativeInt)
        .option('--max-retries <n>', 'Corrective retries per task before escalating', nonNegativeInt)
        .action(
            exitOnError(async (directive: string, options: RunOptions) => {
                const extra: Config = {}
                if (options.concurrency !== undefined && options.concurrency > 0) extra.maxConcurrentTasks = options.concurrency
                if (options.maxRetries !== undefined) extra.protocol = { maxRetries: options.maxRetries }
                const container = await openContainer(program.opts<GlobalOptions>(), extra)
                if (!container.config.apiKey) throw new Error('No API key. Pass --key or set RECOURSE_API_KEY.')

                clack.intro(colors.brand('recourse'))
                const report = await drive(container, () => container.runner.start(directive))
                printReport(report)
                if (report.status !== 'succeeded') process.exitCode = 2
            })
        )

    program
        .command('missions')
        .description('List persisted missions')
        .action(
            exitOnError(async () => {
                const container = await openContainer(program.opts<GlobalOptions>())
                const snapshots = await container.missionStore.list()
                if (snapshots.length === 0) console.log(colors.dim('No missions yet.'))
                for (const s of snapshots) {
                    const goal = await container.goals.recite(s.mission.id).catch(() => null)
                    const progress = goal ? formatProgress(goal) : '-'
                    console.log(`${s.mission.id}  ${formatStatus(s.mission.status)}  ${progress}  ${s.mission.primeDirective}`)
                }
                await container.shutdown()
            })
        )

    program
        .command('history')
        .description('Show the reflexion records of a mission or one of its tasks')
        .argument('<missionId>')
        .argument('[taskId]', 'Only this task', parseTaskId)
        .action(
            exitOnError(async (missionId: string, taskId: number | undefined) => {
                const container = await openContainer(program.opts<GlobalOptions>())
                const records = taskId === undefined ? container.memory.forMission(missionId) : container.memory.forTask(missionId, taskId)
                if (records.length === 0) console.log(colors.dim('No records.'))
                for (const record of records) console.log(formatRecord(record))
                await container.shutdown()
            })
        )

    program
        .command('resolve')
        .description('Answer an escalation for a blocked task, then resume the mission')
        .argument('<missionId>')
        .argument('<taskId>', 'Blocked task', parseTaskId)
        .option('--no-resume', 'Record the decision without resuming')
        .action(
            exitOnError(async (missionId: string, taskId: number, options: { resume: boolean }) => {
                const container = await openContainer(program.opts<GlobalOptions>())
                const snapshot = await container.missionStore.load(missionId)
                const task = snapshot?.tasks.find((t) => t.id === taskId)
                if (!task) throw new Error(`No task ${taskId} in mission ${missionId}`)

                clack.intro(colors.brand('recourse'))
                const resolution = await askResolution(task)
                const confirmed =
                    resolution?.kind !== 'cancel' || (await confirmAction(`Cancel task #${taskId} and every task that depends on it?`))
                if (!resolution || !confirmed) {
                    clack.outro(colors.dim('Nothing changed.'))
                    await container.shutdown()
                    return
                }
                const updated = await container.runner.resolve(missionId, taskId, resolution)
                clack.log.success(formatTask(updated))

                if (!options.resume) {
                    await container.shutdown()
                    return
                }
                const report = await drive(container, () => container.runner.resume(missionId), missionId)
                printReport(report)
            })
        )

    program
        .command('resume')
        .description('Continue a mission that was interrupted or blocked')
        .argument('<missionId>')
        .action(
            exitOnError(async (missionId: string) => {
                const container = await openContainer(program.opts<GlobalOptions>())
                const report = await drive(container, () => container.runner.resume(missionId), missionId)
                printReport(report)
                if (report.status !== 'succeeded') process.exitCode = 2
            })
        )

    return program
}
