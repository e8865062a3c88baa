import type { SessionMetadata } from '../core/types.js'
import type {
    CaptureResult,
    CreateSessionResult,
    ExecuteResult,
    GetMetadataResult,
    KillResult,
    ListSessionsResult,
    SetMetadataResult,
    WaitResult,
} from '../session/agent.js'
import { colors } from './ui.js'

const METADATA_FIELDS: [keyof SessionMetadata, string][] = [
    ['taskType', 'task_type'],
    ['description', 'description'],
    ['createdAt', 'created_at'],
    ['createdBy', 'created_by'],
]

export function renderSessions(result: ListSessionsResult): string[] {
    if (result.sessions.length === 0) return [colors.dim('No active tmux sessions')]
    return [
        'Active tmux sessions:',
        ...result.sessions.map((s) => `  ${colors.session(s.name)} (${s.windows} windows)`),
    ]
}

export function renderCreate(result: CreateSessionResult): string[] {
    const verb = result.action === 'created' ? 'Created' : 'Attached'
    return [`${verb} session: ${colors.session(result.sessionName)}`, colors.dim(`  Attach with: tmux attach -t ${result.sessionName}`)]
}

export function renderExecute(result: ExecuteResult): string[] {
    const lines = [`Command sent to ${colors.session(result.sessionName)}`]
    if (result.transcript === 'skipped') lines.push(colors.warn('  Transcript not writable; capture will read the pane directly'))
    return lines
}

export function renderCapture(result: CaptureResult): string[] {
    const lines = [...result.output]
    if (result.message) lines.push('', colors.dim(result.message))
    return lines
}

export function renderWait(result: WaitResult): string[] {
    switch (result.status) {
        case 'completed':
            return [colors.success(`✓ Command completed in ${result.elapsed}s`), '', 'Output:', ...result.output]
        case 'timeout':
            return [
                colors.warn(`⏱ Command still running after ${result.elapsed}s`),
                '',
                'Current output:',
                ...result.output,
                '',
                result.message ?? '',
            ]
        case 'running':
        case 'cancelled':
            return [`ℹ ${result.message ?? result.status}`, '', 'Current output:', ...result.output]
    }
}

export function renderMetadata(result: GetMetadataResult | SetMetadataResult): string[] {
    if (!('metadata' in result)) return [result.message]

    const lines = [`Session: ${colors.session(result.sessionName)}`]
    if (result.windowName) lines.push(`Window: ${result.windowName}`)
    lines.push('', 'Metadata:')
    for (const [key, label] of METADATA_FIELDS) {
        const value = result.metadata[key]
        if (value) lines.push(`  ${label}: ${value}`)
    }
    return lines
}

export function renderKill(result: KillResult): string[] {
    return [result.message]
}
