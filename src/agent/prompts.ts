/**
 * Prompt templates for the research agent
 */

export function formatPromptDate(date: Date): string {
    return date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric' });
}

export function getSystemPrompt(now: Date = new Date()): string {
    return `You are an expert research assistant. Today's date is ${formatPromptDate(now)}.
Your role is to help users find accurate, relevant information by searching the web, reading pages and analyzing their content, then synthesizing what you found.

Tools:
- search_web: find pages about a topic
- fetch_webpage_content: read the text of a page returned by a search
- analyze_content: pull the facts about one focus out of a long text

Always cite your sources with the URLs you actually retrieved. When users ask about "latest" or "recent" developments, remember that the current year is ${now.getFullYear()}.`;
}

export function getResearchPrompt(query: string, maxResults: number, now: Date = new Date()): string {
    return `Research the following topic and provide comprehensive, detailed findings: ${query}

Search the web (at most ${maxResults} results per search), read the most relevant pages, and base your answer on what they say. Remember, today's date is ${formatPromptDate(now)}.

Respond with ONLY a JSON object in this format, with SPECIFIC, DETAILED information (not generic placeholders):
{
  "query": ${JSON.stringify(query)},
  "summary": "A comprehensive, detailed summary of your findings with specific facts, numbers, and recent developments",
  "keyFindings": ["Specific finding 1 with details", "Specific finding 2 with data", "Specific finding 3 with examples"],
  "sources": ["https://url-of-a-page-you-retrieved", "https://another-url"]
}

Only list URLs in "sources" that came from your tool results. If you could not retrieve anything, answer from your own knowledge and leave "sources" empty.`;
}

export function getQuickSearchPrompt(query: string, now: Date = new Date()): string {
    return `Answer this question concisely: ${query}

Use the tools if you need current information. Today's date is ${formatPromptDate(now)}.
Reply in plain text (a few short paragraphs at most) and end with the URLs you relied on, if any. Do not answer in JSON.`;
}
