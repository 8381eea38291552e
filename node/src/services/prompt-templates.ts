// node/src/services/prompt-templates.ts: prompts for analysis, tool selection, answering and confidence judging
import { PROVINCE_NAMES, type ConversationMessage, type Province } from '@/types/core';
import {
  ENTITY_TYPES,
  QUERY_COMPLEXITIES,
  QUERY_INTENTS,
  ROUTING_DECISIONS,
} from '@/types/query-analysis';

export const ANALYSIS_SYSTEM_PROMPT =
  'You are an expert query analyzer for a Canadian employment-standards HR assistant. ' +
  'Analyze queries precisely and return ONLY valid JSON - no other text, no markdown formatting, just raw JSON.';

const DOMAIN_HINTS = {
  leaveTypes: ['maternity leave', 'parental leave', 'sick leave', 'bereavement leave', 'vacation'],
  concepts: ['minimum wage', 'overtime', 'termination notice', 'severance', 'hours of work', 'statutory holidays'],
  legislation: ['Employment Standards Act', 'Employment Standards Code', 'Labour Standards'],
};

/** Values a stored analysis prompt may reference. */
export function analysisPromptVariables(query: string): Record<string, string> {
  return {
    query,
    leave_types: DOMAIN_HINTS.leaveTypes.join(', '),
    concepts: DOMAIN_HINTS.concepts.join(', '),
    legislation: DOMAIN_HINTS.legislation.join(', '),
  };
}

export function buildAnalysisPrompt(query: string): string {
  return `Analyze the following user query for an employment-standards HR assistant.

Query: "${query}"

Provide a comprehensive analysis including:

1. INTENT CLASSIFICATION, one of: ${QUERY_INTENTS.join(', ')}
2. COMPLEXITY ASSESSMENT, one of: ${QUERY_COMPLEXITIES.join(', ')}
   - simple: single fact, direct answer
   - moderate: synthesis of 2-5 facts
   - complex: multi-step reasoning, 5+ facts
   - very_complex: deep analysis, extensive reasoning
3. ENTITY EXTRACTION, with types: ${ENTITY_TYPES.join(', ')}
4. ROUTING DECISION, one of: ${ROUTING_DECISIONS.join(', ')}
   - standard_rag: normal retrieval + generation
   - tool_invocation: needs a tool (calculator, current time, web search)
   - multi_step_reasoning: complex reasoning chain
   - direct_escalation: out of scope for automated answers
   - cached_response: likely answered before
5. CONTEXT REQUIREMENTS: recent information? multiple sources? how many documents (1-20)? similarity threshold?
6. TOOL REQUIREMENTS: which tools might be useful?
7. KEY CONCEPTS AND TOPICS

Respond in valid JSON with this structure:
{
  "intent": "intent_value",
  "intent_confidence": 0.0-1.0,
  "complexity": "complexity_value",
  "complexity_score": 0.0-1.0,
  "entities": [
    {"text": "entity_text", "type": "entity_type", "confidence": 0.0-1.0, "metadata": {}}
  ],
  "routing": "routing_value",
  "routing_confidence": 0.0-1.0,
  "requires_recent_context": true/false,
  "requires_multiple_sources": true/false,
  "suggested_doc_count": 1-20,
  "suggested_similarity_threshold": 0.4-0.6,
  "requires_tools": true/false,
  "suggested_tools": ["tool1"],
  "key_concepts": ["concept1"],
  "query_topics": ["topic1"],
  "analysis_reasoning": "Explanation of analysis decisions"
}

Domain knowledge for context:
- Leave types: ${DOMAIN_HINTS.leaveTypes.join(', ')}
- Key concepts: ${DOMAIN_HINTS.concepts.join(', ')}
- Legislation: ${DOMAIN_HINTS.legislation.join(', ')}`;
}

export const TOOL_SELECTION_SYSTEM_PROMPT =
  'You choose tools for an HR assistant. Return ONLY valid JSON, no markdown.';

export function buildToolSelectionPrompt(
  query: string,
  tools: Array<{ name: string; description: string; arguments: string }>,
): string {
  const list = tools.map((t) => `- ${t.name}: ${t.description} Arguments: ${t.arguments}`).join('\n');
  return `User question: "${query}"

Available tools:
${list}

Decide which tools (if any) are needed to answer the question. Return JSON:
{
  "tool_calls": [{"tool": "tool_name", "arguments": {}}]
}
Return {"tool_calls": []} when no tool helps.`;
}

export function jurisdictionClause(province: Province): string {
  const name = PROVINCE_NAMES[province];
  return (
    `\n\nIMPORTANT: You are answering questions about ${name} (${province}) employment standards. ` +
    `Only reference laws and regulations that apply to ${name}. Do not mix information from other provinces.`
  );
}

export function buildGenerationSystemPrompt(province?: Province): string {
  const clause = province ? jurisdictionClause(province) : '';
  return `You are a Canadian Employment Standards HR Assistant specializing in provincial employment law.
Your role is to answer questions accurately based on the provided context from official employment standards documents.
${clause}

If the context contains relevant information, use it to provide a detailed answer with specific references.
If the context is insufficient, clearly state what information is missing.

Always be professional, accurate, and cite specific sections or sources when possible.
Never provide legal advice - only informational guidance based on the documents provided.`;
}

export const NO_CONTEXT_TEXT = 'No relevant context found.';
export const NO_HISTORY_TEXT = 'No previous conversation.';

export function formatConversation(history: ConversationMessage[]): string {
  return history
    .map((m) => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
    .join('\n');
}

/** Values a stored answer prompt may reference. */
export function generationPromptVariables(params: {
  query: string;
  contextText: string;
  history: ConversationMessage[];
}): Record<string, string> {
  return {
    query: params.query,
    context: params.contextText || NO_CONTEXT_TEXT,
    conversation_history: params.history.length > 0 ? formatConversation(params.history) : NO_HISTORY_TEXT,
  };
}

export function buildGenerationUserPrompt(params: {
  query: string;
  contextText: string;
  history: ConversationMessage[];
}): string {
  const context = params.contextText || NO_CONTEXT_TEXT;
  if (params.history.length > 0) {
    return `Previous conversation:
${formatConversation(params.history)}

Knowledge base context:
${context}

Current user question: ${params.query}

Please provide a comprehensive answer based on the conversation history and context above.`;
  }
  return `Context information:
${context}

User question: ${params.query}

Please provide a comprehensive answer based on the context above.`;
}

export const CONFIDENCE_JUDGE_SYSTEM_PROMPT =
  'You are a confidence evaluator. Respond with ONLY a number between 0.0 and 1.0.';

export function buildConfidenceJudgePrompt(params: {
  query: string;
  context: string;
  response: string;
}): string {
  return `Evaluate how confident we can be that the response correctly answers the question using only the context.
Consider query understanding, context relevance, response quality and knowledge gaps.

Question:
${params.query}

Context:
${params.context || NO_CONTEXT_TEXT}

Response:
${params.response}

Provide a score between 0.0 and 1.0. Respond with ONLY a number (e.g., '0.85').`;
}
