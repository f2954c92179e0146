import type { ResearchFindings } from '../findings.js';

export type ConversationTurn =
    | {
        kind: 'research';
        query: string;
        findings: ResearchFindings;
        unverifiedSources: readonly string[];
    }
    | {
        kind: 'quick';
        query: string;
        answer: string;
    };
