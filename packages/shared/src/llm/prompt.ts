/**
 * Replace `{{name}}` placeholders with their values. Values are inserted
 * literally, so `$` sequences in contract text are never interpreted.
 */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(vars, name) ? vars[name] : placeholder
  );
}

/**
 * Render any value as a chat message body, for span metadata and debugging.
 */
export function messageText(content: string | Array<{ type: string; text?: string }>): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.type === 'text' && part.text ? part.text : `[${part.type}]`))
    .join('\n');
}
