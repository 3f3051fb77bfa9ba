import { z } from 'zod';
import type {
  SteeringClassificationRequest,
  SteeringIntent,
  SteeringIntentClassifier,
} from './types';
import { DEFAULT_INTENT_ENDPOINT } from './config';
import { describeError, SessionError } from './session-errors';

const DEFAULT_CLASSIFY_TIMEOUT_MS = 15_000;
const BODY_PREVIEW_CHARS = 500;

const RESPONSE_SCHEMA = {
  type: 'OBJECT',
  properties: {
    intent: {
      type: 'STRING',
      enum: ['steer_music', 'block', 'unblock'],
    },
    value: {
      type: 'STRING',
      description: 'The music prompt for steer_music. Empty string for block/unblock.',
    },
    domain: {
      type: 'STRING',
      description: 'The website domain to block/unblock. Empty string if not applicable.',
    },
    app_name: {
      type: 'STRING',
      description: 'The native app display name to block/unblock. Empty string if not applicable.',
    },
  },
  required: ['intent', 'value', 'domain', 'app_name'],
} as const;

const envelopeSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() }).passthrough()).min(1),
        }),
      }).passthrough()
    )
    .min(1),
});

const intentPayloadSchema = z.object({
  intent: z.string(),
  value: z.string().optional().default(''),
  domain: z.string().optional().default(''),
  app_name: z.string().optional().default(''),
});

export function buildClassifierPrompt(blockedDomains: readonly string[], blockedApps: readonly string[]): string {
  const domains = blockedDomains.length > 0 ? blockedDomains.join(', ') : 'none';
  const apps = blockedApps.length > 0 ? blockedApps.join(', ') : 'none';

  return `You classify short commands for a focus music app. A command either steers the music or edits the focus blocklist.

Currently blocked domains: ${domains}
Currently blocked apps: ${apps}

Return exactly one intent:

- "steer_music": the input names a style, genre, mood, instrument or sound. Put the music prompt in "value" and leave "domain" and "app_name" empty. Examples: "rock", "chill vibes", "more bass", "upbeat electronic", "jazz piano".

- "block": the user wants a service blocked. Fill in both "domain" and "app_name" when the service has a website and a native app, and leave whichever does not apply empty. Examples: "block instagram" -> domain="instagram.com", app_name="Instagram". "block gmail" -> domain="mail.google.com", app_name="". "block slack" -> domain="", app_name="Slack".

- "unblock": the user wants a service removed from the blocklist. Fill "domain" and "app_name" the same way as for "block".

Prefer "steer_music" when unsure. Words about music are always "steer_music".

Domain hints:
- "gmail" / "google mail" -> "mail.google.com"
- "youtube" / "yt" -> "youtube.com" (app_name: "YouTube")
- "reddit" -> "reddit.com" (app_name: "Reddit")
- "twitter" / "x" -> "x.com" (app_name: "X")
- "instagram" / "ig" / "insta" -> "instagram.com" (app_name: "Instagram")
- "facebook" / "fb" -> "facebook.com" (app_name: "Facebook")
- "tiktok" -> "tiktok.com" (app_name: "TikTok")
- "linkedin" -> "linkedin.com" (app_name: "LinkedIn")
- "slack" -> "slack.com" (app_name: "Slack")
- "discord" -> "discord.com" (app_name: "Discord")
- Otherwise pick the site's main domain.
- Only set app_name for services commonly used as a native desktop or mobile app.`;
}

export function buildClassifierRequestBody(request: SteeringClassificationRequest) {
  return {
    system_instruction: {
      parts: [{ text: buildClassifierPrompt(request.blockedDomains, request.blockedApps) }],
    },
    contents: [{ role: 'user', parts: [{ text: request.text }] }],
    generationConfig: {
      responseMimeType: 'application/json',
      responseSchema: RESPONSE_SCHEMA,
      temperature: 0,
    },
  };
}

/**
 * Maps the classifier's JSON payload onto a steering intent.
 * Unknown intent names fall back to steering with the returned value.
 */
export function parseIntentResponse(body: unknown): SteeringIntent {
  const envelope = envelopeSchema.safeParse(body);
  const text = envelope.success ? envelope.data.candidates[0].content.parts[0].text : undefined;
  if (text === undefined) {
    throw new SessionError('classification_error', 'Failed to parse intent response');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SessionError('classification_error', 'Failed to parse intent response', { cause: err });
  }

  const payload = intentPayloadSchema.safeParse(raw);
  if (!payload.success) {
    throw new SessionError('classification_error', 'Failed to parse intent response');
  }

  const { intent, value } = payload.data;
  const domain = payload.data.domain.trim().toLowerCase();
  const appName = payload.data.app_name.trim();

  switch (intent) {
    case 'block':
      return { kind: 'block', domain, appName };
    case 'unblock':
      return { kind: 'unblock', domain, appName };
    default:
      return { kind: 'steer_music', prompt: value };
  }
}

export interface GeminiIntentClassifierOptions {
  /** Read on every request so a credential saved later takes effect. */
  apiKey: () => string;
  endpoint?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export class GeminiIntentClassifier implements SteeringIntentClassifier {
  private readonly apiKey: () => string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GeminiIntentClassifierOptions) {
    this.apiKey = options.apiKey;
    this.endpoint = options.endpoint ?? DEFAULT_INTENT_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CLASSIFY_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async classify(request: SteeringClassificationRequest): Promise<SteeringIntent> {
    const key = this.apiKey();
    if (!key) {
      throw new SessionError('classification_error', 'No API key configured');
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.endpoint}?key=${encodeURIComponent(key)}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildClassifierRequestBody(request)),
        signal: controller.signal,
      });
    } catch (err) {
      const message = controller.signal.aborted
        ? `Intent classification timed out after ${this.timeoutMs}ms`
        : describeError(err);
      throw new SessionError('classification_error', message, { cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const preview = await response.text().then(
        (body) => body.slice(0, BODY_PREVIEW_CHARS),
        () => ''
      );
      console.error(`[IntentClassifier] API error ${response.status}: ${preview}`);
      throw new SessionError('classification_error', `Intent service error (HTTP ${response.status})`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new SessionError('classification_error', 'Failed to parse intent response', { cause: err });
    }

    try {
      return parseIntentResponse(body);
    } catch (err) {
      console.error('[IntentClassifier] Unexpected response:', JSON.stringify(body).slice(0, BODY_PREVIEW_CHARS));
      throw err;
    }
  }
}
