import { EmptyModelResponseError } from '../errors';
import { buildMessages } from '../llm/message-style';
import { renderTemplate } from '../llm/prompt';
import type { PromptTemplate } from '../templates';
import { parseJson } from '../schemas';
import type { StageDeps } from './deps';

/**
 * Send one structured-output request with the text model and return the
 * parsed, still unvalidated, JSON payload.
 */
export async function requestStructured(
  template: PromptTemplate,
  vars: Record<string, string>,
  deps: StageDeps,
  wrap: (cause: unknown) => Error
): Promise<unknown> {
  const { text } = deps.settings;
  const completion = await deps.client.complete({
    model: text.model,
    messages: buildMessages(
      text.style,
      template.systemPrompt,
      renderTemplate(template.userPromptTemplate ?? '', vars)
    ),
    temperature: 0,
    responseSchema: template.responseSchema,
  });

  const content = completion.content ?? '';
  if (content.trim().length === 0) {
    throw wrap(new EmptyModelResponseError(text.model));
  }

  try {
    return parseJson(content);
  } catch (error) {
    throw wrap(error);
  }
}
