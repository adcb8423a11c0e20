import { ChatMessage, TranscriptEntry } from '../../types';

export const NO_CONVERSATION_YET = 'No conversation yet.';

/**
 * Condense a session transcript to `Speaker: text` lines. Assistant turns are
 * labelled with the model's display name; failed and cancelled entries are left out.
 */
export function renderTranscript(modelName: string, entries: readonly TranscriptEntry[]): string {
    return entries
        .filter((e) => e.status === 'ok')
        .map((e) => {
            const speaker = e.role === 'user' ? 'User' : e.role === 'assistant' ? modelName : 'System';
            return `${speaker}: ${e.content}\n`;
        })
        .join('');
}

/**
 * Messages for a one-shot "summarize this session" completion.
 */
export function buildSummaryMessages(
    modelName: string,
    systemPrompt: string,
    entries: readonly TranscriptEntry[],
): ChatMessage[] {
    const transcript = renderTranscript(modelName, entries);
    return [
        { role: 'system', content: systemPrompt },
        {
            role: 'user',
            content: `Summarize the following conversation between a user and an assistant named ${modelName}. Provide 2 short bullet points.\n\n${transcript}`,
        },
    ];
}
