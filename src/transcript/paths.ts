import path from 'node:path'

export function sanitizeSessionName(sessionName: string): string {
    return sessionName.replace(/[ /]/g, '_')
}

export function transcriptPath(logDir: string, sessionName: string): string {
    return path.join(logDir, `${sanitizeSessionName(sessionName)}.log`)
}
