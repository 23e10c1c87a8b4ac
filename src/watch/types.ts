/**
 * Watch Types
 */

export type PathEventKind = 'created' | 'modified';

export interface PathEvent {
    /** Absolute path of a non-directory entry; it may be gone by the time the event is read */
    path: string;
    kind: PathEventKind;
}

export interface SourceListener {
    onEvent(event: PathEvent): void;
    /** Called at most once, when the watched directory can no longer be observed */
    onLost(error: SourceLostError): void;
}

export interface EventSource {
    start(listener: SourceListener): Promise<void>;
    stop(): Promise<void>;
}

export interface SourceConfig {
    directory: string;
    /** Offer files already in the directory before watching for new ones */
    includeExisting: boolean;
}

export class SourceUnavailableError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SourceUnavailableError';
    }
}

export class SourceLostError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SourceLostError';
    }
}
