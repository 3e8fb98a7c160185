export const CALIBRATION_OFFSET = 'CALIBRATION_OFFSET';

/** Pause sub-state re-check interval. */
export const PAUSE_POLL_MS = 100;
export const HISTORY_TRACE_LENGTH = 5;

export const INVALID_PLAN_ERROR =
  'Model did not return valid JSON for an action.';

export const buildPlanPrompt = (
  task: string,
  context: string,
  actionHistory: string,
): string => {
  const historySection = actionHistory
    ? `
## RECENT ACTIONS
${actionHistory}
If the same action shows up more than once it is not working. Pick a different approach.
`
    : '';

  return `TASK: ${task}

${context}
${historySection}
---

Study the screenshot and decide the single next step.

<observation>
Which window is in front? Which elements on screen matter for this task?
</observation>

<reasoning>
1. Is the task already finished? Can you see the expected result?
2. If not, which ONE action moves it forward?
3. Where exactly is the target on the 0-1000 grid?
</reasoning>

\`\`\`json
{
  "action": "ACTION",
  "target": "element",
  "coordinates": {"x": NUM, "y": NUM},
  "task_complete": false
}
\`\`\`

Set "task_complete": true as soon as the screenshot shows the task is done.`;
};

export const recoveryPrompt = (
  failedAction: string,
  attemptCount: number,
): string => `'${failedAction}' tried ${attemptCount} times without success.

This approach is not working. Change strategy:
- target a different element
- use a different action kind
- try a keyboard shortcut
- scroll to reveal hidden elements

Do NOT repeat the same action.`;
