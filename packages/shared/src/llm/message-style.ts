/**
 * Message Styles
 *
 * Some providers reject a system role. The style is resolved once per model
 * from configuration and every message list is built through the pure
 * functions below.
 */

import type { ChatContentPart, ChatMessage } from './types';

export const MESSAGE_STYLES = ['openai', 'systemless'] as const;

export type MessageStyle = (typeof MESSAGE_STYLES)[number];

export function isMessageStyle(value: string): value is MessageStyle {
  return (MESSAGE_STYLES as readonly string[]).includes(value);
}

/**
 * Derive the style from a provider-prefixed model id such as
 * `openai/gpt-4o` or `google/gemini-2.5-flash`.
 */
export function resolveMessageStyle(modelId: string): MessageStyle {
  const provider = modelId.split('/')[0]?.toLowerCase();
  return provider === 'openai' ? 'openai' : 'systemless';
}

export function buildMessages(
  style: MessageStyle,
  systemPrompt: string,
  userPrompt: string
): ChatMessage[] {
  switch (style) {
    case 'openai':
      return [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userPrompt },
      ];
    case 'systemless':
      return [{ role: 'user', content: `${systemPrompt}\n\n${userPrompt}` }];
  }
}

export function buildVisionMessages(
  style: MessageStyle,
  systemPrompt: string,
  imageUrl: string
): ChatMessage[] {
  const image: ChatContentPart = { type: 'image_url', image_url: { url: imageUrl } };

  switch (style) {
    case 'openai':
      return [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: [image] },
      ];
    case 'systemless':
      return [
        {
          role: 'user',
          content: [{ type: 'text', text: systemPrompt }, image],
        },
      ];
  }
}
