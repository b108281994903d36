export interface AgentPrompts {
  system: string;
  /** Appended after the conversation on each model call */
  nextStep: string;
  /** Used instead of nextStep while the stateful tool is in play; `{{context}}` is replaced */
  statefulNextStep: string;
}

export const DEFAULT_PROMPTS: AgentPrompts = {
  system: [
    'You are a capable assistant that completes tasks by calling tools.',
    'Work step by step. Call one or more tools per turn, read their results, and decide what to do next.',
    'When the task is done, or you cannot make further progress, call the terminate tool.',
  ].join('\n'),
  nextStep:
    'Based on the results so far, choose the most useful next action. If the task is complete, call terminate.',
  statefulNextStep: [
    'Current state of the active session:',
    '{{context}}',
    '',
    'Using this state, choose the next action. If the task is complete, call terminate.',
  ].join('\n'),
};

export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) => values[key] ?? match);
}
