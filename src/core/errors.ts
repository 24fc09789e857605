export type ErrorKind = 'configuration' | 'gateway' | 'break-timer'

export class TallyError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'TallyError'
        this.kind = kind
    }
}

export class ConfigurationError extends TallyError {
    readonly missing: string[]

    constructor(missing: string[], options?: ErrorOptions) {
        super(`Missing required configuration: ${missing.join(', ')}`, 'configuration', options)
        this.name = 'ConfigurationError'
        this.missing = missing
    }
}

/**
 * Any failure talking to the time-tracking service. 4xx and 5xx are not told
 * apart: every one of them is reported once and left to the user to re-run.
 */
export class GatewayError extends TallyError {
    readonly status?: number

    constructor(message: string, status?: number, options?: ErrorOptions) {
        super(message, 'gateway', options)
        this.name = 'GatewayError'
        this.status = status
    }
}

export class BreakTimerError extends TallyError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'break-timer', options)
        this.name = 'BreakTimerError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}
