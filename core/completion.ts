/**
 * Completion helpers shared by workers and the orchestrator.
 */

import { z } from 'zod';
import { ConfigurationError, MalformedResponseError, ServiceError, errorMessage } from './errors.js';
import type { CompletionRequest, LLMClient } from './types.js';

/**
 * The one structural position the generated text is read from.
 */
const CompletionPayloadSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
});

/**
 * Read choices[0].message.content from a raw chat-completion payload.
 *
 * @throws MalformedResponseError when the field is missing, `choices` is
 *   empty, or the content is not a string
 */
export function extractCompletionText(payload: unknown, component: string): string {
  const parsed = CompletionPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '/'} ${i.message}`)
      .join('; ');
    throw new MalformedResponseError(
      component,
      `Unexpected response format from generation service in ${component}: ${issues}`
    );
  }
  return parsed.data.choices[0].message.content;
}

/**
 * Pick the credential for a call. An explicit value wins over the default.
 */
export function resolveCredential(
  explicit: string | undefined,
  fallback: string | undefined,
  component: string
): string {
  const key = explicit?.trim() || fallback?.trim();
  if (!key) {
    throw new ConfigurationError(
      `No API key available for ${component}. Set OPENAI_API_KEY or pass an explicit credential.`
    );
  }
  return key;
}

/**
 * Invoke the client and return the trimmed text.
 *
 * Any failure of the call itself becomes a ServiceError naming `component`.
 */
export async function requestCompletion(
  llm: LLMClient,
  request: CompletionRequest,
  component: string
): Promise<string> {
  let payload: unknown;
  try {
    payload = await llm.invoke(request);
  } catch (error) {
    throw new ServiceError(
      component,
      `${component} failed to call the generation service: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  return extractCompletionText(payload, component).trim();
}
