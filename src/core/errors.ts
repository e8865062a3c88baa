export type ErrorKind = 'not_found' | 'invalid_argument' | 'tmux'

/** Kinds that abort an operation and surface as an error envelope. */
export type FatalErrorKind = Extract<ErrorKind, 'not_found' | 'invalid_argument'>

export class TermAgentError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'TermAgentError'
        this.kind = kind
    }
}

export class NotFoundError extends TermAgentError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'not_found', options)
        this.name = 'NotFoundError'
    }
}

export class InvalidArgumentError extends TermAgentError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'invalid_argument', options)
        this.name = 'InvalidArgumentError'
    }
}

export class TmuxCommandError extends TermAgentError {
    readonly args: string[]

    constructor(message: string, args: string[], options?: ErrorOptions) {
        super(message, 'tmux', options)
        this.name = 'TmuxCommandError'
        this.args = args
    }
}

export function isFatal(error: unknown): error is TermAgentError & { kind: FatalErrorKind } {
    return error instanceof TermAgentError && (error.kind === 'not_found' || error.kind === 'invalid_argument')
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS'])

export function isPermissionError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('code' in error)) return false
    return typeof error.code === 'string' && PERMISSION_CODES.has(error.code)
}
