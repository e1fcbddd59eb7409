import type { ToolDefinition } from "../providers/types.js";
import { INTENT_TYPES, type Intent, type Plan, type StepResult } from "./types.js";

export const INTENT_PARSER_PROMPT = `You are an Intent Parser. Your ONLY job is to analyze the user request and output valid JSON.

CRITICAL RULES:
1. Output ONLY valid JSON - no explanations, no markdown, no extra text
2. Use ONLY the exact field names specified
3. Do NOT add any fields not in the schema

Required JSON format:
{
  "reasoning": "Your understanding of what the user wants",
  "intent_type": "${INTENT_TYPES.join("|")}",
  "requires_tools": true|false,
  "entities": ["list", "of", "key", "entities"],
  "complexity": "simple|moderate|complex"
}

Intent Types:
- search: User wants to find information (web search, documentation lookup)
- fetch: User wants to retrieve specific content (webpage, file, API data)
- analyze: User wants analysis of existing data
- execute: User wants to run commands or scripts
- create: User wants to create new files/resources
- modify: User wants to edit existing files/resources
- deep_research: User wants deep investigation (search + read + summarize) into a topic
- general: Conversational or unclear intent

Complexity Levels:
- simple: Single action, clear goal
- moderate: 2-3 steps, some dependencies
- complex: Multiple steps, complex dependencies

Now analyze this user request and output ONLY the JSON:`;

export function buildIntentPrompt(query: string): string {
	return `${INTENT_PARSER_PROMPT}\n\nUser: ${query}`;
}

/**
 * Appends the rejected output and the validator's complaint to the base
 * prompt, so the next attempt gets a targeted correction.
 */
export function buildRetryPrompt(basePrompt: string, previousOutput: string, error: string, query?: string): string {
	const retry = `${basePrompt}

Previous attempt produced invalid output: ${previousOutput}
Error: ${error}

Please output ONLY valid JSON matching the schema exactly.`;
	return query === undefined ? retry : `${retry}\n\nUser: ${query}`;
}

/** Longest tool output quoted back to the model per step. */
export const RESULT_EXCERPT_LENGTH = 1500;

function excerpt(text: string): string {
	const trimmed = text.trim();
	if (trimmed.length <= RESULT_EXCERPT_LENGTH) return trimmed;
	return `${trimmed.slice(0, RESULT_EXCERPT_LENGTH)}... [truncated]`;
}

function formatOutput(result: StepResult): string {
	const output = excerpt(result.result);
	return output ? `  Output: ${output}\n` : "";
}

export function formatToolsSection(tools: ToolDefinition[]): string {
	if (tools.length === 0) return "(no tools available)\n";
	return tools.map((tool) => `- ${tool.name}: ${tool.description}\n`).join("");
}

export function buildPlannerPrompt(intent: Intent, tools: ToolDefinition[], maxSteps: number): string {
	return `You are a Task Planner. Your goal is to create a valid JSON plan for the user's intent.

INSTRUCTIONS:
1. First, ANALYZE the request and available tools in a <reasoning> text block.
2. Then, GENERATE the JSON plan based on your reasoning.
3. The JSON must be valid and adhere to the schema.
4. "depends_on" field must use 1-BASED step numbers referring to PREVIOUS steps. Never use 0.
5. Use "depends_on": [] only for steps that are truly independent of every other step.
6. Do NOT include comments (like // or /* */) inside the JSON. Put all remarks in the <reasoning> block.
7. Use at most ${maxSteps} steps.

CRITICAL TOOL USAGE RULES:
- Do NOT use 'bash' to run 'open', 'xdg-open', 'start', 'curl', or 'wget'.
- ALWAYS use 'web_fetch' to read websites.
- ALWAYS use 'web_search' to find information.
- Use ONLY tool names from the list below as "action".

Available Tools:
${formatToolsSection(tools)}
Passing results between steps:
- "$EXTRACT_URL_FROM_STEP_<n>": first URL in the result of step n
- "$EXTRACT_FIRST_URL": first URL in the result of the previous step
- "$EXTRACT_JSON_FIELD:step_<n>:<field>": a field of the JSON returned by step n
- "$REGEX:step_<n>:<pattern>": first capture group of <pattern> in the result of step n

Required JSON Schema:
{
  "steps": [
    {
      "step_number": 1,
      "action": "tool_name",
      "parameters": {"param": "value"},
      "reasoning": "Why this step is needed",
      "depends_on": []
    }
  ],
  "expected_outcome": "Goal description"
}

Special Instructions for 'search' and 'deep_research':
If the intent is 'search' or 'deep_research', you MUST create a multi-step plan:
1. web_search: Search for the topic.
2. web_fetch / read_page: Read the content of the most relevant 2-3 results. Do NOT stop at search results.
3. (Implicit): The results will be synthesized in the final phase.

Intent:
Type: ${intent.intent_type}
Goal: ${intent.reasoning}
Entities: ${intent.entities.join(", ")}
Complexity: ${intent.complexity}

Output your reasoning followed by the JSON plan now:`;
}

export function buildValidationPrompt(intent: Intent, plan: Plan, results: StepResult[]): string {
	const resultsText = results
		.filter((r) => r.step_number > 0)
		.map((r) => `Step ${r.step_number}: ${r.status} - ${r.observation}\n${formatOutput(r)}`)
		.join("");

	return `You are a Result Validator.

Original Intent: ${intent.reasoning}
Expected Outcome: ${plan.expected_outcome}

Results from execution:
${resultsText}
Output ONLY valid JSON:
{
  "intent_fulfilled": true|false,
  "missing_information": ["list", "of", "gaps"],
  "confidence": 0-100,
  "recommendation": "proceed|retry|replan"
}`;
}

export function buildSynthesisPrompt(query: string, results: StepResult[]): string {
	const resultsText = results
		.filter((r) => r.status === "success")
		.map((r) => `- ${r.observation}\n${formatOutput(r)}`)
		.join("");

	return `You are a Response Synthesizer.

Original Query: ${query}

Results Summary:
${resultsText}
Create a clear, concise response to the user. Include:
1. Direct answer to their question
2. Key findings from the results
3. Any relevant context

Keep it under 200 words. Be specific and factual.`;
}
