import { Command, InvalidArgumentError as CommanderArgumentError, Option } from 'commander'
import { loadConfig } from '../config/loader.js'
import { type Container, createContainer } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { type Envelope, isErrorEnvelope, TASK_TYPES } from '../core/types.js'
import { doctorCommand } from './commands/doctor.js'
import {
    renderCapture,
    renderCreate,
    renderExecute,
    renderKill,
    renderMetadata,
    renderSessions,
    renderWait,
} from './render.js'
import { formatError } from './ui.js'

interface GlobalOptions {
    json?: boolean
    logDir?: string
    debug?: boolean
}

interface TargetOptions {
    window?: string
    pane: number
}

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10)
    if (Number.isNaN(parsed) || parsed < 0) throw new CommanderArgumentError('Not a non-negative integer.')
    return parsed
}

// negative lines reach into the scrollback history
function parseLine(value: string): number {
    const parsed = Number.parseInt(value, 10)
    if (Number.isNaN(parsed)) throw new CommanderArgumentError('Not an integer.')
    return parsed
}

function parseSeconds(value: string): number {
    const parsed = Number.parseFloat(value)
    if (Number.isNaN(parsed) || parsed < 0) throw new CommanderArgumentError('Not a non-negative number of seconds.')
    return parsed
}

async function bootstrap(command: Command): Promise<{ container: Container; globals: GlobalOptions }> {
    const globals = command.optsWithGlobals<GlobalOptions>()
    const fs = new NodeFileSystem()
    const config = await loadConfig({
        fs,
        cliFlags: {
            logDir: globals.logDir,
            logLevel: globals.debug ? 'debug' : undefined,
        },
    })
    return { container: await createContainer(config, { fs }), globals }
}

/**
 * Runs one agent operation and prints its envelope: raw JSON with --json,
 * otherwise the rendered lines. Error envelopes set a failing exit code.
 */
async function run<T extends { status: string }>(
    command: Command,
    operation: (container: Container) => Promise<Envelope<T>>,
    render: (result: T) => string[]
): Promise<void> {
    try {
        const { container, globals } = await bootstrap(command)
        const result = await operation(container)

        if (globals.json) {
            console.log(JSON.stringify(result, null, 2))
        } else if (isErrorEnvelope(result)) {
            console.error(formatError(result.message))
        } else {
            console.log(render(result).join('\n'))
        }
        if (isErrorEnvelope(result)) process.exitCode = 1
    } catch (error) {
        console.error(formatError(errorMessage(error)))
        process.exitCode = 1
    }
}

function targetOptions(command: Command): Command {
    return command
        .option('-w, --window <name>', 'Window name (uses the active window if not specified)')
        .option('-p, --pane <index>', 'Pane index', parseInteger, 0)
}

function taskTypeOption(): Option {
    return new Option('--task-type <type>', 'Type of task').choices(TASK_TYPES)
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('term-agent')
        .description('Drive tmux sessions for automated callers: dispatch commands, then read bounded summaries')
        .version('0.1.0')
        .option('--json', 'Print results as JSON')
        .option('--log-dir <dir>', 'Directory for transcripts (default: project .term-agent/logs or ~/.term-agent/logs)')
        .option('--debug', 'Enable debug logging')

    program
        .command('list')
        .description('List tmux sessions')
        .action(async (_options: object, command: Command) => {
            await run(command, ({ agent }) => agent.listSessions(), renderSessions)
        })

    program
        .command('create')
        .description('Create a session, or attach to an existing one by name')
        .option('-n, --name <name>', 'Session name (generated when omitted)')
        .addOption(taskTypeOption())
        .option('-d, --description <text>', 'Human-readable description of the task')
        .action(async (options: { name?: string; taskType?: string; description?: string }, command: Command) => {
            await run(command, ({ agent }) => agent.getOrCreateSession(options), renderCreate)
        })

    targetOptions(
        program
            .command('exec')
            .description('Send a command to a session, marking its start in the transcript')
            .argument('<session>', 'Session name')
            .argument('<command>', 'Command to run')
    ).action(async (session: string, text: string, options: TargetOptions, command: Command) => {
        await run(command, ({ agent }) => agent.executeCommand(session, text, options), renderExecute)
    })

    targetOptions(
        program
            .command('capture')
            .description('Show the output of the last command, summarized when long')
            .argument('<session>', 'Session name')
            .option('--start <line>', 'Start line for a direct pane capture', parseLine)
            .option('--end <line>', 'End line for a direct pane capture', parseLine)
            .option('--full', 'Return the full output without smart extraction')
    ).action(async (session: string, options: TargetOptions & { start?: number; end?: number; full?: boolean }, command: Command) => {
        await run(command, ({ agent }) => agent.captureOutput(session, options), renderCapture)
    })

    targetOptions(
        program
            .command('wait')
            .description('Wait until the shell prompt returns, or the timeout passes')
            .argument('<session>', 'Session name')
            .option('-t, --timeout <seconds>', 'Maximum seconds to wait', parseSeconds)
            .option('--poll-interval <seconds>', 'Seconds between pane samples', parseSeconds)
            .option('--no-respect-metadata', 'Wait even for background and watcher tasks')
    ).action(
        async (
            session: string,
            options: TargetOptions & { timeout?: number; pollInterval?: number; respectMetadata: boolean },
            command: Command
        ) => {
            const controller = new AbortController()
            const onInterrupt = () => controller.abort()
            process.once('SIGINT', onInterrupt)
            try {
                await run(
                    command,
                    ({ agent }) => agent.waitForCompletion(session, { ...options, signal: controller.signal }),
                    renderWait
                )
            } finally {
                process.off('SIGINT', onInterrupt)
            }
        }
    )

    program
        .command('metadata')
        .description('Get or set session (or window) metadata')
        .argument('<session>', 'Session name')
        .option('-w, --window <name>', 'Window name (operates on the session if not specified)')
        .option('--set', 'Set metadata')
        .addOption(taskTypeOption())
        .option('-d, --description <text>', 'Description to set')
        .action(
            async (
                session: string,
                options: { window?: string; set?: boolean; taskType?: string; description?: string },
                command: Command
            ) => {
                const setting = options.set || options.taskType !== undefined || options.description !== undefined
                if (setting) {
                    await run(command, ({ agent }) => agent.setMetadata(session, options), renderMetadata)
                } else {
                    await run(command, ({ agent }) => agent.getMetadata(session, options.window), renderMetadata)
                }
            }
        )

    program
        .command('kill')
        .description('Kill a session and delete its transcript')
        .argument('<session>', 'Session name')
        .option('--keep-log', 'Keep the transcript file')
        .action(async (session: string, options: { keepLog?: boolean }, command: Command) => {
            await run(command, ({ agent }) => agent.killSession(session, options), renderKill)
        })

    program
        .command('doctor')
        .description('Environment diagnostics')
        .action(async (_options: object, command: Command) => {
            try {
                const { container } = await bootstrap(command)
                if (!(await doctorCommand(container))) process.exitCode = 1
            } catch (error) {
                console.error(formatError(errorMessage(error)))
                process.exitCode = 1
            }
        })

    return program
}
