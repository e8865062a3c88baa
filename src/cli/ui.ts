import pc from 'picocolors'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    session: (name: string) => pc.cyan(name),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}
