import type { Task } from "../catalog/TaskCatalog.js";

export const CONTEXT_PLACEHOLDER = "{context}";
export const CONTEXT_SEPARATOR = "\nreply based on the content here:";

/**
 * Order is fixed: the instruction goes first, then the user prompt, and
 * context substitution (or appending) happens last. Pure.
 */
export const composePrompt = (
  userPrompt: string,
  context?: string,
  systemInstruction?: string,
): string => {
  let prompt = systemInstruction ? `${systemInstruction}\n\n${userPrompt}` : userPrompt;
  if (context !== undefined) {
    // split/join rather than replaceAll so `$&`-style sequences in file text stay literal
    prompt = prompt.includes(CONTEXT_PLACEHOLDER)
      ? prompt.split(CONTEXT_PLACEHOLDER).join(context)
      : `${prompt}${CONTEXT_SEPARATOR}${context}`;
  }
  return prompt;
};

export interface InstructionSelection {
  instruction?: string;
  userPrompt: string;
}

/** An explicit user prompt wins over the task's default one. */
export const applyTask = (task: Task, userPrompt?: string): InstructionSelection => ({
  instruction: task.systemPrompt || undefined,
  userPrompt: userPrompt ?? task.userPrompt,
});
