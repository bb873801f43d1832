import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

export const RESEARCH_DEPTHS = ['quick', 'standard', 'deep'] as const;
export type ResearchDepth = (typeof RESEARCH_DEPTHS)[number];

function isResearchDepth(value: string): value is ResearchDepth {
  return RESEARCH_DEPTHS.some((depth) => depth === value);
}

const QUERIES_PER_DEPTH: Record<ResearchDepth, number> = { quick: 2, standard: 4, deep: 6 };

/** Prompt text guiding a model through the Exa tools for one topic. */
export function buildResearchPrompt(topic: string, depthInput?: string): string {
  const normalized = depthInput?.trim().toLowerCase() ?? 'standard';
  const depth: ResearchDepth = isResearchDepth(normalized) ? normalized : 'standard';
  const queryCount = QUERIES_PER_DEPTH[depth];

  const delegation =
    depth === 'deep'
      ? `Start an asynchronous report with **exa_research_start** (model \`exa-research-pro\`) right away, and poll it with **exa_research_check** while you work through the steps below. Compare its report with your own findings before writing.`
      : `If the topic needs a long multi-source report, **exa_research_start** can run one asynchronously; poll it with **exa_research_check**.`;

  return `You are researching a topic with the Exa search tools. Produce a well-sourced answer with numbered citations.

**Topic:** ${topic}
**Depth:** ${depth}

---

## Workflow

### Step 1: Quick answer
Call **exa_answer** with the topic phrased as a question. Treat its answer as a starting hypothesis and note its sources.

### Step 2: Search
Write ${queryCount} focused queries covering different angles of the topic and run each with **exa_search**. Use \`category\` (news, research paper, company, ...) and published-date filters where they narrow the results. For programming topics use **exa_code_search** instead.

### Step 3: Read
Pick the most authoritative results and read them in full with **exa_get_contents** (\`content.include_text: true\`). Use \`content.include_summary\` with a \`summary_query\` when you only need one fact from a long page.

### Step 4: Expand
For the best source, call **exa_find_similar** to discover related pages the searches missed.

### Step 5: Long-running work
${delegation}

### Step 6: Write
Structure the result as:
- **Summary**: two or three paragraphs with the main conclusions.
- **Key Findings**: bullet points, each with a citation like [1].
- **Sources**: numbered list of title, URL and publication date.

## Guidelines
- Cite every factual claim.
- Prefer primary sources and note when a source may be outdated.
- Say so explicitly when sources conflict or evidence is thin.

Begin now.`;
}

export function registerResearchPrompts(server: McpServer): void {
  server.prompt(
    'web-research',
    'Guide for researching a topic with the Exa search, contents, answer and research tools',
    {
      topic: z.string().describe('Research topic or question'),
      depth: z.string().optional().describe('Research depth: quick, standard, or deep'),
    },
    ({ topic, depth }) => ({
      messages: [
        {
          role: 'user' as const,
          content: { type: 'text' as const, text: buildResearchPrompt(topic, depth) },
        },
      ],
    }),
  );
}
