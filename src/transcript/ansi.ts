/** ESC followed by a single-character Fe escape, or a full CSI sequence. */
export const ANSI_ESCAPE_PATTERN = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g

export function stripAnsi(text: string): string {
    return text.replace(ANSI_ESCAPE_PATTERN, '')
}
