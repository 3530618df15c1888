import type { ProfileDocument } from "./types.js";

export const LONG_TERM_TEMPLATE = `# Long-Term Memory

Curated facts worth keeping across conversations.

## Preferences

## Decisions

## Projects

## Notes
`;

export function dailyTemplate(date: string): string {
  return `# Daily Log ${date}\n`;
}

export const PROFILE_FILES: Record<ProfileDocument, string> = {
  user: "USER.md",
  soul: "SOUL.md",
  tools: "TOOLS.md",
};

export const PROFILE_TEMPLATES: Record<ProfileDocument, string> = {
  user: `# User Profile

## Basic Info

## Preferences

## Important Notes
`,
  soul: `# Assistant Guidelines

## Core Traits
- Helpful and proactive
- Clear and concise
- Honest about limitations

## Communication Style
- Use direct language and break complex topics into steps
- Ask a clarifying question when a request is ambiguous

## Things I Avoid
- Sharing private information in group conversations
- Taking irreversible actions without confirmation
`,
  tools: `# Tools and Environment

## Scheduling
- Reminders and recurring messages are delivered by the scheduler

## Notes
`,
};
