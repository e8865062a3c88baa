export interface ErrorSignature {
    label: string
    pattern: RegExp
}

/**
 * Checked in order against every line. The first signature hit by the first
 * matching line names the error type; any hit marks the line for context.
 */
export const ERROR_SIGNATURES: readonly ErrorSignature[] = [
    { label: 'python_traceback', pattern: /Traceback \(most recent call last\)/i },
    { label: 'generic_error', pattern: /Error:/i },
    { label: 'exception', pattern: /Exception:/i },
    { label: 'compilation_error', pattern: /error:/i },
    { label: 'test_failure', pattern: /FAILED/i },
    { label: 'assertion_error', pattern: /AssertionError/i },
    { label: 'syntax_error', pattern: /SyntaxError/i },
    { label: 'type_error', pattern: /TypeError/i },
    { label: 'javascript_error', pattern: /at .+:\d+:\d+/i },
]

export const CONTEXT_BEFORE = 10
export const CONTEXT_AFTER = 20
export const CLOSING_LINES = 5
export const HEAD_LINES = 10
export const TAIL_LINES = 10
export const PLACEHOLDER = '...'

export type SummaryMethod = 'first_last' | `error_extraction_${string}`

export interface Summary {
    lines: string[]
    method: SummaryMethod
}

export function classifyLine(line: string): ErrorSignature | undefined {
    return ERROR_SIGNATURES.find((signature) => signature.pattern.test(line))
}

export function findErrorLines(lines: readonly string[]): { indices: number[]; errorType: string | undefined } {
    const indices: number[] = []
    let errorType: string | undefined
    lines.forEach((line, i) => {
        const signature = classifyLine(line)
        if (!signature) return
        indices.push(i)
        errorType ??= signature.label
    })
    return { indices, errorType }
}

function extractErrorContext(lines: readonly string[], indices: number[]): string[] {
    const extracted: string[] = []
    const seen = new Set<string>()
    let lastEnd = 0

    for (const index of indices) {
        const start = Math.max(0, index - CONTEXT_BEFORE)
        const end = Math.min(lines.length, index + CONTEXT_AFTER + 1)
        const key = `${start}:${end}`
        if (seen.has(key)) continue
        seen.add(key)

        // every distinct window is emitted whole, even when it overlaps the previous one
        if (extracted.length > 0 && extracted[extracted.length - 1] !== PLACEHOLDER) {
            extracted.push(PLACEHOLDER, '')
        }
        extracted.push(...lines.slice(start, end))
        lastEnd = end
    }

    if (lines.length - lastEnd > CONTEXT_AFTER) {
        extracted.push(PLACEHOLDER, '', ...lines.slice(-CLOSING_LINES))
    }
    return extracted
}

function extractHeadTail(lines: readonly string[]): string[] {
    const omitted = lines.length - HEAD_LINES - TAIL_LINES
    return [
        ...lines.slice(0, HEAD_LINES),
        '',
        `... (${omitted} lines omitted) ...`,
        '',
        ...lines.slice(-TAIL_LINES),
    ]
}

/** Compresses a long output region into error context, or its head and tail. */
export function summarize(lines: readonly string[]): Summary {
    const { indices, errorType } = findErrorLines(lines)
    if (errorType !== undefined) {
        return { lines: extractErrorContext(lines, indices), method: `error_extraction_${errorType}` }
    }
    return { lines: extractHeadTail(lines), method: 'first_last' }
}
