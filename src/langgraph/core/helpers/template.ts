export function interpolate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => vars[key] ?? match);
}

// Prompt-friendly JSON; undefined renders as an empty object.
export function toPromptJson(value: unknown): string {
  return JSON.stringify(value ?? {}, null, 2);
}
