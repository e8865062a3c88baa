export interface SessionInfo {
    id: string
    name: string
    windows: number
}

export interface WindowInfo {
    id: string
    index: number
    name: string
    active: boolean
}

export interface PaneInfo {
    id: string
    index: number
    active: boolean
}

/** Where a user option lives: the session itself, or one of its windows. */
export interface OptionScope {
    session: string
    window?: string
}

export interface CaptureRange {
    start?: number
    end?: number
}

/**
 * The terminal multiplexer control surface. Lookups of absent objects
 * resolve to undefined; failures of the multiplexer itself reject.
 */
export interface PaneProvider {
    listSessions(): Promise<SessionInfo[]>
    findSession(name: string): Promise<SessionInfo | undefined>
    newSession(name: string): Promise<SessionInfo>
    killSession(name: string): Promise<void>

    listWindows(session: string): Promise<WindowInfo[]>
    listPanes(windowId: string): Promise<PaneInfo[]>

    getOption(scope: OptionScope, key: string): Promise<string | undefined>
    setOption(scope: OptionScope, key: string, value: string): Promise<void>
    listOptions(scope: OptionScope): Promise<Record<string, string>>

    /** Types `text` literally into the pane, then presses Enter. */
    sendKeys(paneId: string, text: string): Promise<void>
    /** Visible pane content, trailing blank rows removed. */
    capturePane(paneId: string, range?: CaptureRange): Promise<string[]>

    /** Starts copying the session's active pane output onto the end of `filePath`. */
    startPipe(session: string, filePath: string): Promise<void>
    stopPipe(session: string): Promise<void>
}
