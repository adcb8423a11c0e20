import { v4 as uuid } from 'uuid';
import {
    ChatMessage,
    ChatRole,
    ChatSession,
    EntryStatus,
    ModelDefinition,
    TranscriptEntry,
} from '../../types';

export interface SessionView {
    id: string;
    name: string;
    provider: string;
    modelId: string;
    description: string;
    busy: boolean;
    transcript: readonly TranscriptEntry[];
}

/**
 * Per-model conversation state. Operations run one at a time through a FIFO
 * queue; only the operation currently running may append to the transcript.
 */
export class Session implements ChatSession {
    readonly id: string = uuid();
    private entries: TranscriptEntry[] = [];
    private running = false;
    private tail: Promise<unknown> = Promise.resolve();

    constructor(readonly model: ModelDefinition) {}

    get displayName(): string {
        return this.model.name;
    }

    get transcript(): readonly TranscriptEntry[] {
        return this.entries;
    }

    get busy(): boolean {
        return this.running;
    }

    /**
     * Queue an operation behind any already running or waiting on this session.
     */
    run<T>(operation: () => Promise<T>): Promise<T> {
        const result = this.tail.then(async () => {
            this.running = true;
            try {
                return await operation();
            } finally {
                this.running = false;
            }
        });
        this.tail = result.catch(() => undefined);
        return result;
    }

    append(role: ChatRole, content: string, status: EntryStatus = 'ok'): TranscriptEntry {
        const entry: TranscriptEntry = Object.freeze({
            id: uuid(),
            role,
            content,
            status,
            provider: this.model.provider,
            timestamp: new Date().toISOString(),
        });
        this.entries.push(entry);
        return entry;
    }

    /** Successful entries as provider-neutral messages, oldest first. */
    history(): ChatMessage[] {
        return this.entries
            .filter((e) => e.status === 'ok')
            .map((e) => ({ role: e.role, content: e.content }));
    }

    toView(): SessionView {
        return {
            id: this.id,
            name: this.model.name,
            provider: this.model.provider,
            modelId: this.model.modelId,
            description: this.model.description,
            busy: this.running,
            transcript: [...this.entries],
        };
    }
}
