type LogMethod = (...args: unknown[]) => void

export interface Logger {
    debug: LogMethod
    info: LogMethod
    warn: LogMethod
    error: LogMethod
}

// stdout is reserved for findings, everything else goes to stderr
export const createLogger = ({ verbose = false }: { verbose?: boolean } = {}): Logger => ({
    debug: verbose ? (...args) => console.error('[debug]', ...args) : () => {},
    info: (...args) => console.error(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
})

export const getErrorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error))
