export { Session } from './chat-session';
export type { SessionView } from './chat-session';
export { SessionOrchestrator, resolveCredential } from './session-orchestrator';
