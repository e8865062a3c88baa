import type { ResolvedConfig } from '../config/schema.js'
import { type LogDir, resolveLogDir } from '../config/log-dir.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { TerminalAgent } from '../session/agent.js'
import { TmuxClient } from '../tmux/client.js'
import type { PaneProvider } from '../tmux/types.js'
import { type Clock, systemClock } from './clock.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    fs: FileSystem
    clock: Clock
    logDir: LogDir
    provider: PaneProvider
    agent: TerminalAgent
}

interface ContainerOverrides {
    fs?: FileSystem
    logger?: Logger
    provider?: PaneProvider
    clock?: Clock
}

export async function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Promise<Container> {
    const logger = overrides.logger ?? createLogger(config)
    const fs = overrides.fs ?? new NodeFileSystem()
    const clock = overrides.clock ?? systemClock
    const provider = overrides.provider ?? new TmuxClient(logger)
    const logDir = await resolveLogDir({ fs, logger, projectDir: config.projectDir, explicit: config.logDir })

    logger.debug({ logDir }, 'transcript directory resolved')

    const agent = new TerminalAgent({
        provider,
        fs,
        logger,
        clock,
        logDir: logDir.dir,
        defaults: {
            maxLines: config.capture.maxLines,
            timeout: config.wait.timeout,
            pollInterval: config.wait.pollInterval,
        },
    })

    return { config, logger, fs, clock, logDir, provider, agent }
}
