import type { ToolDefinition } from '../clients/openrouter.js';
import { analyzeContentTool } from './analyze-content.js';
import { fetchWebpageTool } from './fetch-webpage.js';
import { searchWebTool } from './search-web.js';
import type { ResearchTool } from './types.js';

export const RESEARCH_TOOLS: readonly ResearchTool[] = [
    searchWebTool,
    fetchWebpageTool,
    analyzeContentTool,
];

export function findTool(tools: readonly ResearchTool[], name: string): ResearchTool | undefined {
    return tools.find(tool => tool.name === name);
}

export function toToolDefinitions(tools: readonly ResearchTool[]): ToolDefinition[] {
    return tools.map(({ name, description, parameters }) => ({ name, description, parameters }));
}
