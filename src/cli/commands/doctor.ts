import path from 'node:path'
import { execa } from 'execa'
import { errorMessage } from '../../core/errors.js'
import type { Container } from '../../core/container.js'
import { colors } from '../ui.js'

export interface Check {
    name: string
    status: 'ok' | 'warn' | 'error'
    message: string
}

export async function runChecks(container: Container): Promise<Check[]> {
    const checks: Check[] = []

    try {
        const { stdout } = await execa('tmux', ['-V'])
        checks.push({ name: 'tmux', status: 'ok', message: stdout.trim() })
    } catch {
        checks.push({ name: 'tmux', status: 'error', message: 'Not found (required)' })
    }

    const { dir, source } = container.logDir
    checks.push({
        name: 'Log directory',
        status: source === 'fallback' ? 'warn' : 'ok',
        message: source === 'fallback' ? `${dir} (preferred location not writable)` : `${dir} (${source})`,
    })

    const probe = path.join(dir, '.doctor-probe')
    try {
        await container.fs.appendText(probe, '')
        await container.fs.remove(probe)
        checks.push({ name: 'Transcripts', status: 'ok', message: 'Writable' })
    } catch (error) {
        checks.push({ name: 'Transcripts', status: 'warn', message: `Not writable: ${errorMessage(error)}` })
    }

    try {
        const sessions = await container.provider.listSessions()
        checks.push({ name: 'Sessions', status: 'ok', message: `${sessions.length} active` })
    } catch (error) {
        checks.push({ name: 'Sessions', status: 'warn', message: errorMessage(error) })
    }

    return checks
}

export function formatChecks(checks: Check[]): string[] {
    const lines = checks.map((check) => {
        const icon =
            check.status === 'ok' ? colors.success('✓') :
            check.status === 'warn' ? colors.warn('!') :
            colors.error('✗')
        return `  ${icon} ${check.name.padEnd(15)} ${check.message}`
    })

    const errors = checks.filter((c) => c.status === 'error')
    lines.push('')
    lines.push(errors.length === 0 ? colors.success('All good!') : colors.warn(`${errors.length} problem(s) found.`))
    return lines
}

export async function doctorCommand(container: Container): Promise<boolean> {
    console.log(colors.brand('term-agent doctor\n'))
    const checks = await runChecks(container)
    console.log(formatChecks(checks).join('\n'))
    return checks.every((c) => c.status !== 'error')
}
