import type { FileSystem } from '../core/fs.js'
import { stripAnsi } from './ansi.js'
import { endMarkerFor, startMarkerFor } from './markers.js'
import { type SummaryMethod, summarize } from './summarizer.js'

export const DEFAULT_MAX_LINES = 20

export type ExtractionMethod = 'full' | 'no_file' | 'marker_not_found' | SummaryMethod

export interface ExtractionResult {
    lines: string[]
    lineCount: number
    extractionMethod: ExtractionMethod
    truncated: boolean
    originalLineCount?: number
    forcedFull?: boolean
    message?: string
}

export interface ExtractOptions {
    maxLines?: number
    forceFull?: boolean
}

const LINE_BREAK = /\r\n|\r|\n/

/**
 * Splits file content the way a universal-newline reader would: `\r\n`, a lone
 * `\r` (progress redraws) and `\n` all end a line, and a trailing break does
 * not open an empty line.
 */
export function splitLines(content: string): string[] {
    if (content === '') return []
    const lines = content.split(LINE_BREAK)
    if (content.endsWith('\n') || content.endsWith('\r')) lines.pop()
    return lines
}

export function cleanLine(line: string): string {
    return stripAnsi(line.trimEnd())
}

/**
 * Lines after the marker, up to its end sentinel or end of transcript.
 * Returns undefined when the marker is not in the transcript.
 */
export function findRegion(lines: readonly string[], markerId: string): string[] | undefined {
    const start = startMarkerFor(markerId)
    const startIndex = lines.findIndex((line) => line.includes(start))
    if (startIndex < 0) return undefined

    const end = endMarkerFor(markerId)
    const region: string[] = []
    for (let i = startIndex + 1; i < lines.length; i++) {
        const line = lines[i]
        if (line === undefined || line.includes(end)) break
        region.push(cleanLine(line))
    }
    return region
}

function emptyResult(extractionMethod: 'no_file' | 'marker_not_found'): ExtractionResult {
    return { lines: [], lineCount: 0, extractionMethod, truncated: false }
}

export async function extractFromMarker(
    fs: FileSystem,
    transcript: string,
    markerId: string,
    options: ExtractOptions = {}
): Promise<ExtractionResult> {
    const { maxLines = DEFAULT_MAX_LINES, forceFull = false } = options

    if (!(await fs.exists(transcript))) return emptyResult('no_file')

    const region = findRegion(splitLines(await fs.readText(transcript)), markerId)
    if (!region) return emptyResult('marker_not_found')

    const lineCount = region.length
    if (forceFull || lineCount <= maxLines) {
        return { lines: region, lineCount, extractionMethod: 'full', truncated: false, forcedFull: forceFull }
    }

    const summary = summarize(region)
    return {
        lines: summary.lines,
        lineCount,
        originalLineCount: lineCount,
        extractionMethod: summary.method,
        truncated: true,
        message: `Output has ${lineCount} lines, showing ${summary.lines.length} relevant lines`,
    }
}
