export type ErrorKind = 'transient' | 'permanent'

export class RecourseError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'RecourseError'
        this.kind = kind
    }
}

export class TransientError extends RecourseError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends RecourseError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

export class KnowledgeBaseConflict extends RecourseError {
    constructor(
        readonly documentName: string,
        readonly attempts: number
    ) {
        super(`Persona '${documentName}' kept changing underneath ${attempts} write attempts`, 'transient')
        this.name = 'KnowledgeBaseConflict'
    }
}

export class InvalidPlanError extends RecourseError {
    constructor(message: string) {
        super(message, 'permanent')
        this.name = 'InvalidPlanError'
    }
}

export class MissionCancelledError extends RecourseError {
    constructor(readonly missionId: string) {
        super(`Mission ${missionId} was cancelled`, 'permanent')
        this.name = 'MissionCancelledError'
    }
}

export function classifyHttpError(status: number): ErrorKind {
    if ([429, 500, 502, 503, 504].includes(status)) return 'transient'
    return 'permanent'
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof DOMException && error.name === 'AbortError') return true
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

function hasStatus(error: unknown): error is { status: number } {
    return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof RecourseError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (hasStatus(error)) return classifyHttpError(error.status)
    return 'permanent'
}
