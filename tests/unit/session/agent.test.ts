import { describe, it, expect, beforeEach, vi } from 'vitest'
import pino from 'pino'
import { MockFileSystem } from '../../../src/core/fs.js'
import { TmuxCommandError } from '../../../src/core/errors.js'
import { OPTION_KEYS } from '../../../src/session/metadata.js'
import { type PaneSelector, TerminalAgent } from '../../../src/session/agent.js'
import { FakeClock } from '../../helpers/fake-clock.js'
import { FakePaneProvider } from '../../helpers/fake-pane-provider.js'

const logger = pino({ level: 'silent' })
const LOG = '/logs/dev.log'

describe('TerminalAgent', () => {
    let provider: FakePaneProvider
    let fs: MockFileSystem
    let clock: FakeClock
    let agent: TerminalAgent

    beforeEach(() => {
        provider = new FakePaneProvider()
        fs = new MockFileSystem()
        clock = new FakeClock(1_700_000_000_000)
        agent = new TerminalAgent({ provider, fs, logger, logDir: '/logs', clock })
    })

    describe('listSessions', () => {
        it('reports names and window counts', async () => {
            provider.addSession('dev', [{ name: 'main' }, { name: 'logs' }])

            expect(await agent.listSessions()).toEqual({
                status: 'success',
                sessions: [{ id: '$0', name: 'dev', windows: 2 }],
            })
        })

        it('is empty without sessions', async () => {
            expect(await agent.listSessions()).toEqual({ status: 'success', sessions: [] })
        })
    })

    describe('getOrCreateSession', () => {
        it('attaches to an existing session without touching its metadata', async () => {
            provider.addSession('dev')

            const result = await agent.getOrCreateSession({ name: 'dev', taskType: 'watcher' })

            expect(result).toMatchObject({ status: 'success', action: 'attached', sessionName: 'dev', taskType: null })
            expect(provider.optionsFor({ session: 'dev' }).size).toBe(0)
        })

        it('creates a session and records its metadata', async () => {
            const result = await agent.getOrCreateSession({ name: 'build', taskType: 'oneshot', description: 'release build' })

            expect(result).toMatchObject({
                status: 'success',
                action: 'created',
                sessionName: 'build',
                windows: 1,
                taskType: 'oneshot',
                description: 'release build',
            })
            expect(provider.optionsFor({ session: 'build' }).get(OPTION_KEYS.createdAt)).toBe('1700000000')
        })

        it('generates a name when none is given', async () => {
            const result = await agent.getOrCreateSession()

            if (result.status === 'error') throw new Error(result.message)
            expect(result.sessionName).toMatch(/^agent-[0-9a-f]{8}$/)
            expect(result.action).toBe('created')
        })

        it('rejects an invalid task type without creating anything', async () => {
            const result = await agent.getOrCreateSession({ name: 'build', taskType: 'daemon' })

            expect(result).toEqual({
                status: 'error',
                kind: 'invalid_argument',
                message: "Invalid task_type 'daemon'. Must be one of: interactive, background, watcher, oneshot",
            })
            expect(await provider.listSessions()).toEqual([])
        })
    })

    describe('metadata', () => {
        beforeEach(() => {
            provider.addSession('dev', [{ name: 'main' }, { name: 'server' }])
        })

        it('sets and reads window metadata', async () => {
            expect(await agent.setMetadata('dev', { window: 'server', taskType: 'watcher' })).toEqual({
                status: 'success',
                message: 'Metadata set',
                taskType: 'watcher',
                description: null,
            })

            expect(await agent.getMetadata('dev', 'server')).toEqual({
                status: 'success',
                sessionName: 'dev',
                windowName: 'server',
                metadata: { taskType: 'watcher', description: null, createdAt: '1700000000', createdBy: 'term-agent' },
            })
            expect(provider.optionsFor({ session: 'dev' }).size).toBe(0)
        })

        it('reports a missing window', async () => {
            expect(await agent.getMetadata('dev', 'worker')).toEqual({
                status: 'error',
                kind: 'not_found',
                message: "Window 'worker' not found in session 'dev'",
            })
        })

        it('reports a missing session', async () => {
            expect(await agent.setMetadata('ghost', { description: 'x' })).toEqual({
                status: 'error',
                kind: 'not_found',
                message: "Session 'ghost' not found",
            })
        })
    })

    describe('executeCommand', () => {
        beforeEach(() => {
            provider.addSession('dev')
        })

        it('starts the pipe, writes the marker and sends the keys', async () => {
            const result = await agent.executeCommand('dev', 'npm test')

            if (result.status === 'error') throw new Error(result.message)
            const paneId = provider.paneId('dev')
            expect(result).toMatchObject({
                status: 'success',
                sessionName: 'dev',
                windowName: 'main',
                paneId,
                logFile: LOG,
                transcript: 'written',
                message: 'Command sent',
            })
            expect(provider.pipes.get('dev')).toBe(LOG)
            expect(provider.optionsFor({ session: 'dev' }).get(OPTION_KEYS.logFile)).toBe(LOG)
            expect(provider.optionsFor({ session: 'dev' }).get(OPTION_KEYS.lastMarker)).toBe(result.markerId)
            expect(provider.sentKeys).toEqual([{ paneId, text: 'npm test' }])
            expect(await fs.readText(LOG)).toBe(`\n===TERM-AGENT-CMD-START=== ${result.markerId} 1700000000 npm test\n`)
        })

        it('starts the pipe only once per transcript', async () => {
            const startPipe = vi.spyOn(provider, 'startPipe')

            await agent.executeCommand('dev', 'ls')
            await agent.executeCommand('dev', 'pwd')

            expect(startPipe).toHaveBeenCalledTimes(1)
        })

        it('targets the active window by default', async () => {
            provider.addSession('multi', [{ name: 'editor', active: false }, { name: 'shell', active: true }])

            const result = await agent.executeCommand('multi', 'make')

            expect(result).toMatchObject({ windowName: 'shell', paneId: provider.paneId('multi', 1) })
        })

        it('targets a pane by index', async () => {
            provider.addSession('split', [{ name: 'main', panes: 2 }])

            await agent.executeCommand('split', 'htop', { pane: 1 })

            expect(provider.sentKeys).toEqual([{ paneId: provider.paneId('split', 0, 1), text: 'htop' }])
        })

        it('sanitizes session names into the transcript path', async () => {
            provider.addSession('my project')

            const result = await agent.executeCommand('my project', 'ls')

            expect(result).toMatchObject({ logFile: '/logs/my_project.log' })
        })

        const missingTargets: [string, PaneSelector, string][] = [
            ['ghost', {}, "Session 'ghost' not found"],
            ['dev', { window: 'logs' }, "Window 'logs' not found in session 'dev'"],
            ['dev', { pane: 3 }, 'Pane index 3 out of range (window has 1 panes)'],
        ]

        it.each(missingTargets)('reports a missing target (%s %j) without side effects', async (session, selector, message) => {
            const result = await agent.executeCommand(session, 'rm -rf build', selector)

            expect(result).toEqual({ status: 'error', kind: 'not_found', message })
            expect(provider.sentKeys).toEqual([])
            expect(fs.getFiles().size).toBe(0)
        })

        it('still sends the command when the transcript is not writable', async () => {
            fs.deny('/logs')

            const result = await agent.executeCommand('dev', 'make')

            expect(result).toMatchObject({ status: 'success', transcript: 'skipped' })
            expect(provider.sentKeys).toHaveLength(1)
        })

        it('propagates tmux failures', async () => {
            vi.spyOn(provider, 'sendKeys').mockRejectedValue(new TmuxCommandError('tmux send-keys failed: boom', ['send-keys']))

            await expect(agent.executeCommand('dev', 'ls')).rejects.toThrow('tmux send-keys failed: boom')
        })
    })

    describe('captureOutput', () => {
        beforeEach(() => {
            provider.addSession('dev')
        })

        it('reads the region after the last marker', async () => {
            const sent = await agent.executeCommand('dev', 'npm test')
            if (sent.status === 'error') throw new Error(sent.message)
            await fs.appendText(LOG, 'npm test\r\n\x1b[32mok\x1b[0m 3 passed\r\n$ \r\n')

            expect(await agent.captureOutput('dev')).toEqual({
                status: 'success',
                sessionName: 'dev',
                source: 'transcript',
                logFile: LOG,
                markerId: sent.markerId,
                output: ['npm test', 'ok 3 passed', '$'],
                lineCount: 3,
                extractionMethod: 'full',
                truncated: false,
                forcedFull: false,
                originalLineCount: undefined,
                message: undefined,
            })
        })

        it('summarizes long regions', async () => {
            await agent.executeCommand('dev', 'seq 30')
            await fs.appendText(LOG, Array.from({ length: 30 }, (_, i) => `${i + 1}\n`).join(''))

            const result = await agent.captureOutput('dev')

            expect(result).toMatchObject({
                extractionMethod: 'first_last',
                truncated: true,
                lineCount: 30,
                message: 'Output has 30 lines, showing 23 relevant lines',
            })
        })

        it('returns the whole region when forced', async () => {
            await agent.executeCommand('dev', 'seq 30')
            await fs.appendText(LOG, Array.from({ length: 30 }, (_, i) => `${i + 1}\n`).join(''))

            const result = await agent.captureOutput('dev', { full: true })

            if (result.status === 'error') throw new Error(result.message)
            expect(result.output).toHaveLength(30)
            expect(result.forcedFull).toBe(true)
            expect(result.truncated).toBe(false)
        })

        it('honours the configured maxLines', async () => {
            agent = new TerminalAgent({ provider, fs, logger, logDir: '/logs', clock, defaults: { maxLines: 40 } })
            await agent.executeCommand('dev', 'seq 30')
            await fs.appendText(LOG, Array.from({ length: 30 }, (_, i) => `${i + 1}\n`).join(''))

            expect(await agent.captureOutput('dev')).toMatchObject({ extractionMethod: 'full', lineCount: 30 })
        })

        it('falls back to the pane without a marker', async () => {
            const paneId = provider.paneId('dev')
            provider.setScreens(paneId, ['$ ls', 'src', '$'])

            expect(await agent.captureOutput('dev', { start: -50, end: 10 })).toEqual({
                status: 'success',
                sessionName: 'dev',
                source: 'pane',
                windowName: 'main',
                paneId,
                output: ['$ ls', 'src', '$'],
                lineCount: 3,
                extractionMethod: 'capture_pane',
                truncated: false,
                forcedFull: false,
            })
            expect(provider.captures).toEqual([{ paneId, range: { start: -50, end: 10 } }])
        })

        it('falls back to the pane when the transcript is gone', async () => {
            provider.optionsFor({ session: 'dev' }).set(OPTION_KEYS.lastMarker, 'a1b2c3d4e5f6')
            provider.setScreens(provider.paneId('dev'), ['$'])

            expect(await agent.captureOutput('dev')).toMatchObject({ source: 'pane', output: ['$'] })
        })

        it('falls back to the pane when the marker is missing', async () => {
            fs.setFile(LOG, 'old output\n')
            provider.optionsFor({ session: 'dev' }).set(OPTION_KEYS.lastMarker, 'a1b2c3d4e5f6')
            provider.setScreens(provider.paneId('dev'), ['$'])

            expect(await agent.captureOutput('dev')).toMatchObject({ source: 'pane', extractionMethod: 'capture_pane' })
        })

        it('falls back to the pane when the transcript cannot be read', async () => {
            await agent.executeCommand('dev', 'make')
            vi.spyOn(fs, 'readText').mockRejectedValue(Object.assign(new Error(`EACCES: open '${LOG}'`), { code: 'EACCES' }))
            provider.setScreens(provider.paneId('dev'), ['make: Nothing to be done', '$'])

            expect(await agent.captureOutput('dev')).toMatchObject({
                status: 'success',
                source: 'pane',
                extractionMethod: 'capture_pane',
                output: ['make: Nothing to be done', '$'],
            })
        })

        it('propagates other transcript read failures', async () => {
            await agent.executeCommand('dev', 'make')
            vi.spyOn(fs, 'readText').mockRejectedValue(Object.assign(new Error('EIO: i/o error'), { code: 'EIO' }))

            await expect(agent.captureOutput('dev')).rejects.toThrow('EIO')
        })

        it('reports a missing session', async () => {
            expect(await agent.captureOutput('ghost')).toEqual({
                status: 'error',
                kind: 'not_found',
                message: "Session 'ghost' not found",
            })
        })
    })

    describe('waitForCompletion', () => {
        let paneId: string

        beforeEach(() => {
            provider.addSession('dev')
            paneId = provider.paneId('dev')
        })

        it('completes when the prompt returns', async () => {
            provider.setScreens(paneId, ['building'], ['built', '$ '])

            expect(await agent.waitForCompletion('dev')).toEqual({
                status: 'completed',
                sessionName: 'dev',
                windowName: 'main',
                paneId,
                output: ['built', '$ '],
                elapsed: 0.5,
                timedOut: false,
            })
            expect(clock.sleeps).toEqual([500])
        })

        it('times out and leaves the command running', async () => {
            provider.setScreens(paneId, ['building'])

            const result = await agent.waitForCompletion('dev', { timeout: 1, pollInterval: 0.5 })

            expect(result).toMatchObject({
                status: 'timeout',
                elapsed: 1,
                timedOut: true,
                message: "Command still running after 1s (check again later with 'capture' or 'wait')",
            })
            expect(provider.killed).toEqual([])
        })

        it('does not wait on a watcher session', async () => {
            provider.optionsFor({ session: 'dev' }).set(OPTION_KEYS.taskType, 'watcher')
            provider.setScreens(paneId, ['Watching for changes'])

            expect(await agent.waitForCompletion('dev')).toMatchObject({
                status: 'running',
                taskType: 'watcher',
                elapsed: 0,
                message: "Task type 'watcher' - not waiting for completion",
            })
            expect(clock.sleeps).toEqual([])
        })

        it('reads the task type of the chosen window', async () => {
            provider.addSession('app', [{ name: 'shell' }, { name: 'server' }])
            provider.optionsFor({ session: 'app', window: 'server' }).set(OPTION_KEYS.taskType, 'background')

            expect(await agent.waitForCompletion('app', { window: 'server' })).toMatchObject({ status: 'running', taskType: 'background' })
        })

        it('can ignore the task type', async () => {
            provider.optionsFor({ session: 'dev' }).set(OPTION_KEYS.taskType, 'watcher')
            provider.setScreens(paneId, ['$ '])

            expect(await agent.waitForCompletion('dev', { respectMetadata: false })).toMatchObject({ status: 'completed' })
        })

        it('reports a cancelled wait', async () => {
            const controller = new AbortController()
            controller.abort()
            provider.setScreens(paneId, ['building'])

            expect(await agent.waitForCompletion('dev', { signal: controller.signal })).toMatchObject({
                status: 'cancelled',
                elapsed: 0,
                message: 'Stopped waiting after 0s; the command is still running',
            })
        })
    })

    describe('killSession', () => {
        beforeEach(async () => {
            provider.addSession('dev')
            await agent.executeCommand('dev', 'ls')
        })

        it('stops the pipe, deletes the transcript and kills the session', async () => {
            expect(await agent.killSession('dev')).toEqual({
                status: 'success',
                message: "Session 'dev' killed",
                logFileRemoved: true,
            })
            expect(provider.pipes.has('dev')).toBe(false)
            expect(provider.killed).toEqual(['dev'])
            expect(await fs.exists(LOG)).toBe(false)
        })

        it('keeps the transcript on request', async () => {
            expect(await agent.killSession('dev', { keepLog: true })).toMatchObject({ logFileRemoved: false })
            expect(await fs.exists(LOG)).toBe(true)
        })

        it('still kills the session when the transcript cannot be removed', async () => {
            fs.deny('/logs')

            expect(await agent.killSession('dev')).toMatchObject({ status: 'success', logFileRemoved: false })
            expect(provider.killed).toEqual(['dev'])
        })

        it('reports a missing session', async () => {
            expect(await agent.killSession('ghost')).toMatchObject({ status: 'error', kind: 'not_found' })
        })
    })
})
