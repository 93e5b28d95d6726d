/**
 * Prompt text sent with every request.
 */

export interface PromptSet {
  system: string;
  guideline: string;
}

export const DEFAULT_PROMPTS: PromptSet = {
  system:
    "You are a helpful system admin who provides users with commands to execute inside terminal, when asked. " +
    "Return your response as a valid JSON object.",
  guideline: `Follow the below guidelines.

## **General Rules**
- **Do**:
  - Provide variations of the command in the order of increasing complexity
  - Append very short, minimal *inline comments* for each command
- **Do not**:
  - Add newlines for comments.
  - Provide any remarks.

`,
};

const OS_NAMES: Record<string, string> = {
  darwin: "macOS",
  linux: "Linux",
  win32: "Windows",
  freebsd: "FreeBSD",
  openbsd: "OpenBSD",
};

export function osName(platform: string): string {
  return OS_NAMES[platform] ?? platform;
}

export function buildUserPrompt(prompts: PromptSet, platform: string, question: string): string {
  return `${prompts.guideline}For the **${osName(platform)}** operating system, what is the command for ${question}?`;
}
