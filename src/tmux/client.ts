import { ExecaError, execa } from 'execa'
import { TmuxCommandError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { CaptureRange, OptionScope, PaneInfo, PaneProvider, SessionInfo, WindowInfo } from './types.js'

// Names go last: window names may contain the separator, session and pane ids cannot.
const SESSION_FORMAT = '#{session_id}:#{session_windows}:#{session_name}'
const WINDOW_FORMAT = '#{window_id}:#{window_index}:#{window_active}:#{window_name}'
const PANE_FORMAT = '#{pane_id}:#{pane_index}:#{pane_active}'

const NO_SERVER_PATTERN = /no server running|error connecting|no sessions/i

export function sessionTarget(session: string): string {
    return `=${session}`
}

export function scopeTarget(scope: OptionScope): string {
    return scope.window === undefined ? sessionTarget(scope.session) : `${sessionTarget(scope.session)}:${scope.window}`
}

export function quoteForShell(value: string): string {
    return `'${value.replace(/'/g, "'\\''")}'`
}

function splitFields(line: string, count: number): string[] {
    const parts = line.split(':')
    return [...parts.slice(0, count - 1), parts.slice(count - 1).join(':')]
}

export function parseSession(line: string): SessionInfo {
    const [id = '', windows = '0', name = ''] = splitFields(line, 3)
    return { id, name, windows: Number.parseInt(windows, 10) }
}

export function parseWindow(line: string): WindowInfo {
    const [id = '', index = '0', active = '0', name = ''] = splitFields(line, 4)
    return { id, index: Number.parseInt(index, 10), name, active: active === '1' }
}

export function parsePane(line: string): PaneInfo {
    const [id = '', index = '0', active = '0'] = splitFields(line, 3)
    return { id, index: Number.parseInt(index, 10), active: active === '1' }
}

function unquote(value: string): string {
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
        return value.slice(1, -1).replace(/\\(["\\$])/g, '$1')
    }
    if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
        return value.slice(1, -1)
    }
    return value
}

/** Parses `show-options` output, keeping only user (`@`) options. */
export function parseOptions(output: string): Record<string, string> {
    const options: Record<string, string> = {}
    for (const line of output.split('\n')) {
        if (!line.startsWith('@')) continue
        const space = line.indexOf(' ')
        if (space < 0) continue
        options[line.slice(0, space)] = unquote(line.slice(space + 1))
    }
    return options
}

function nonEmptyLines(output: string): string[] {
    return output.split('\n').filter((line) => line.length > 0)
}

export function trimTrailingBlankRows(lines: string[]): string[] {
    let end = lines.length
    while (end > 0 && (lines[end - 1] ?? '').trim() === '') end--
    return lines.slice(0, end)
}

/** Runs one tmux invocation and resolves to its stdout; failures reject with TmuxCommandError. */
export type TmuxExec = (args: string[]) => Promise<string>

export function execTmux(binary = 'tmux'): TmuxExec {
    return async (args) => {
        try {
            const { stdout } = await execa(binary, args)
            return stdout
        } catch (error) {
            if (!(error instanceof ExecaError)) throw error
            const stderr = typeof error.stderr === 'string' ? error.stderr.trim() : ''
            throw new TmuxCommandError(`tmux ${args[0] ?? ''} failed: ${stderr || error.shortMessage}`, args, { cause: error })
        }
    }
}

export class TmuxClient implements PaneProvider {
    constructor(
        private logger: Logger,
        private exec: TmuxExec = execTmux()
    ) {}

    private async run(args: string[]): Promise<string> {
        this.logger.debug({ args }, 'tmux')
        return this.exec(args)
    }

    async listSessions(): Promise<SessionInfo[]> {
        try {
            return nonEmptyLines(await this.run(['list-sessions', '-F', SESSION_FORMAT])).map(parseSession)
        } catch (error) {
            if (error instanceof TmuxCommandError && NO_SERVER_PATTERN.test(error.message)) return []
            throw error
        }
    }

    async findSession(name: string): Promise<SessionInfo | undefined> {
        return (await this.listSessions()).find((session) => session.name === name)
    }

    async newSession(name: string): Promise<SessionInfo> {
        const output = await this.run(['new-session', '-d', '-s', name, '-P', '-F', SESSION_FORMAT])
        return parseSession(nonEmptyLines(output)[0] ?? '')
    }

    async killSession(name: string): Promise<void> {
        await this.run(['kill-session', '-t', sessionTarget(name)])
    }

    async listWindows(session: string): Promise<WindowInfo[]> {
        return nonEmptyLines(await this.run(['list-windows', '-t', sessionTarget(session), '-F', WINDOW_FORMAT])).map(parseWindow)
    }

    async listPanes(windowId: string): Promise<PaneInfo[]> {
        const panes = nonEmptyLines(await this.run(['list-panes', '-t', windowId, '-F', PANE_FORMAT])).map(parsePane)
        return panes.sort((a, b) => a.index - b.index)
    }

    private optionArgs(command: string, scope: OptionScope): string[] {
        return scope.window === undefined ? [command, '-t', scopeTarget(scope)] : [command, '-w', '-t', scopeTarget(scope)]
    }

    async getOption(scope: OptionScope, key: string): Promise<string | undefined> {
        const value = await this.run([...this.optionArgs('show-options', scope), '-q', '-v', key])
        return value === '' ? undefined : value
    }

    async setOption(scope: OptionScope, key: string, value: string): Promise<void> {
        await this.run([...this.optionArgs('set-option', scope), key, value])
    }

    async listOptions(scope: OptionScope): Promise<Record<string, string>> {
        return parseOptions(await this.run(this.optionArgs('show-options', scope)))
    }

    async sendKeys(paneId: string, text: string): Promise<void> {
        await this.run(['send-keys', '-t', paneId, '-l', '--', text])
        await this.run(['send-keys', '-t', paneId, 'Enter'])
    }

    async capturePane(paneId: string, range: CaptureRange = {}): Promise<string[]> {
        const args = ['capture-pane', '-p', '-t', paneId]
        if (range.start !== undefined) args.push('-S', String(range.start))
        if (range.end !== undefined) args.push('-E', String(range.end))
        return trimTrailingBlankRows((await this.run(args)).split('\n'))
    }

    async startPipe(session: string, filePath: string): Promise<void> {
        await this.run(['pipe-pane', '-o', '-t', sessionTarget(session), `cat >> ${quoteForShell(filePath)}`])
    }

    async stopPipe(session: string): Promise<void> {
        await this.run(['pipe-pane', '-t', sessionTarget(session)])
    }
}
