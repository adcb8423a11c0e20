// ─── Model Catalog Types ───

export type ParameterValue = number | string | boolean;

export interface ParameterDefinition {
    readonly name: string;
    readonly description: string;
    readonly default?: ParameterValue;
}

export interface ModelDefinition {
    readonly name: string;
    readonly provider: string;
    readonly modelId: string;
    readonly description: string;
    readonly endpoint?: string;
    readonly parameters: readonly ParameterDefinition[];
}

export interface SummaryConfig {
    readonly systemPrompt: string;
}

export interface ModelCatalog {
    readonly summary: SummaryConfig;
    readonly models: readonly ModelDefinition[];
}

// ─── Chat Types ───

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    readonly role: ChatRole;
    readonly content: string;
}

// ─── Connection Types ───

export interface HandshakeResult {
    readonly success: boolean;
    readonly message: string;
    readonly handshakeId: string;
}

export interface ConnectionState {
    readonly provider: string;
    readonly connected: boolean;
    readonly lastHandshakeTime: Date | null;
    readonly lastMessage: string;
}

export interface ConnectionStatusEvent {
    readonly provider: string;
    readonly connected: boolean;
    readonly message: string;
    readonly timestamp: Date;
}

export type ConnectionStatusListener = (event: ConnectionStatusEvent) => void;

// ─── Session Types ───

export type EntryStatus = 'ok' | 'error' | 'cancelled';

export interface TranscriptEntry {
    readonly id: string;
    readonly role: ChatRole;
    readonly content: string;
    readonly status: EntryStatus;
    readonly provider: string;
    readonly timestamp: string; // ISO8601
}

export interface ChatSession {
    readonly id: string;
    readonly model: ModelDefinition;
    readonly transcript: readonly TranscriptEntry[];
    readonly busy: boolean;
}

/**
 * A credential is either one opaque string used for every provider, or a
 * per-provider lookup. Resolution precedence lives outside the orchestrator.
 */
export type CredentialInput = string | ((provider: string) => string | undefined);

export type SendStatus = 'ok' | 'error' | 'cancelled' | 'skipped';

export interface SendOutcome {
    readonly sessionId: string;
    readonly status: SendStatus;
    readonly reply?: string;
    readonly error?: string;
}

export interface BroadcastResult extends SendOutcome {
    readonly modelName: string;
}
