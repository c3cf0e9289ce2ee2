// ---------------------------------------------------------------------------
// Newsletter Prose — Chat Completions HTTP Client
// Throttling (p-throttle), retry (p-retry), Zod validation of every response
// ---------------------------------------------------------------------------

import pRetry, { AbortError } from "p-retry";
import pThrottle from "p-throttle";
import { z } from "zod";
import {
	categoryPrompt,
	eventPrompt,
	previewTextPrompt,
	subjectLinePrompt,
	summaryPrompt,
	tierPrompt,
} from "./prompts";
import { cleanProse } from "./text";
import type {
	CategoryProseRequest,
	DocumentProseRequest,
	EventProseRequest,
	ProseCallOptions,
	ProseProvider,
	TierProseRequest,
} from "./types";

export interface ChatProseClientOptions {
	/** API root, e.g. "https://api.openai.com/v1" */
	baseUrl: string;
	apiKey: string;
	/** Model name (default: "gpt-4o") */
	model?: string;
	/** Token cap for the longest answers (default: 150) */
	maxTokens?: number;
	/** Sampling temperature (default: 0.7) */
	temperature?: number;
	/** Requests per second (default: 2) */
	rateLimit?: number;
	/** Max retries on failure (default: 3) */
	maxRetries?: number;
	/** First retry delay in ms (default: 1000) */
	retryMinTimeoutMs?: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
}

export class ProseServiceError extends Error {
	constructor(
		public readonly status: number,
		public readonly statusText: string,
		public readonly body: string,
		public readonly url: string,
	) {
		super(`Prose service error ${status} (${statusText}) for ${url}`);
		this.name = "ProseServiceError";
	}
}

const DEFAULT_RETRY_AFTER_MS = 5000;

/** Retry-After in delta-seconds; an HTTP-date or anything unreadable waits the default. */
export function retryAfterMs(header: string | null): number {
	if (header === null || !/^\d+$/.test(header.trim())) return DEFAULT_RETRY_AFTER_MS;
	return Number.parseInt(header.trim(), 10) * 1000;
}

function abortReason(signal: AbortSignal): Error | string {
	const reason: unknown = signal.reason;
	return reason instanceof Error ? reason : "Prose request aborted";
}

const ChatCompletionSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({
					content: z.string().nullable(),
				}),
			}),
		)
		.min(1),
});

/**
 * {@link ProseProvider} backed by a chat-completions endpoint.
 *
 * - Bearer authentication
 * - Rate limiting via p-throttle
 * - Retry on 429, 5xx and network errors via p-retry (exponential, jitter)
 * - Other 4xx responses abort immediately
 * - Answers are cleaned of quotes, numbering and bullets
 */
export class ChatProseClient implements ProseProvider {
	private readonly endpoint: string;
	private readonly apiKey: string;
	private readonly model: string;
	private readonly maxTokens: number;
	private readonly temperature: number;
	private readonly maxRetries: number;
	private readonly retryMinTimeoutMs: number;
	private readonly fetchFn: typeof fetch;
	private readonly throttledPost: (body: string, signal?: AbortSignal) => Promise<Response>;

	constructor(options: ChatProseClientOptions) {
		if (!options.apiKey || options.apiKey.trim().length === 0) {
			throw new Error("ChatProseClient construction error: an `apiKey` is required.");
		}
		this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`;
		this.apiKey = options.apiKey;
		this.model = options.model ?? "gpt-4o";
		this.maxTokens = options.maxTokens ?? 150;
		this.temperature = options.temperature ?? 0.7;
		this.maxRetries = options.maxRetries ?? 3;
		this.retryMinTimeoutMs = options.retryMinTimeoutMs ?? 1000;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;

		const throttle = pThrottle({
			limit: options.rateLimit ?? 2,
			interval: 1000,
		});

		this.throttledPost = throttle(async (body: string, signal?: AbortSignal) => {
			// A call queued by the throttle may outlive its caller
			if (signal?.aborted) throw new AbortError(abortReason(signal));
			return this.fetchFn(this.endpoint, {
				method: "POST",
				headers: {
					Authorization: `Bearer ${this.apiKey}`,
					"Content-Type": "application/json",
					Accept: "application/json",
				},
				body,
				signal,
			});
		});
	}

	subjectLine(request: DocumentProseRequest, options?: ProseCallOptions): Promise<string> {
		return this.complete(subjectLinePrompt(request), 100, options?.signal);
	}

	previewText(request: DocumentProseRequest, options?: ProseCallOptions): Promise<string> {
		return this.complete(previewTextPrompt(request), 100, options?.signal);
	}

	summary(request: DocumentProseRequest, options?: ProseCallOptions): Promise<string> {
		return this.complete(summaryPrompt(request), this.maxTokens, options?.signal);
	}

	categoryDescription(request: CategoryProseRequest, options?: ProseCallOptions): Promise<string> {
		return this.complete(categoryPrompt(request), this.maxTokens, options?.signal);
	}

	tierDescription(request: TierProseRequest, options?: ProseCallOptions): Promise<string> {
		return this.complete(tierPrompt(request), 50, options?.signal);
	}

	eventDescription(request: EventProseRequest, options?: ProseCallOptions): Promise<string> {
		return this.complete(eventPrompt(request), this.maxTokens, options?.signal);
	}

	/**
	 * Sends one user prompt and returns the cleaned answer ("" when the
	 * model returned no content). Aborting `signal` stops the request, any
	 * pending retry and any Retry-After wait.
	 */
	async complete(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string> {
		const body = JSON.stringify({
			model: this.model,
			messages: [{ role: "user", content: prompt }],
			max_tokens: Math.min(maxTokens, this.maxTokens),
			temperature: this.temperature,
		});

		const response = await pRetry(
			async () => {
				const res = await this.throttledPost(body, signal);

				if (res.status === 429) {
					await this.delay(retryAfterMs(res.headers.get("Retry-After")), signal);
					throw new ProseServiceError(res.status, res.statusText, "", this.endpoint);
				}

				// Auth failures are not retried
				if (res.status === 401 || res.status === 403) {
					const responseBody = await res.text();
					throw new AbortError(
						new ProseServiceError(res.status, res.statusText, responseBody, this.endpoint),
					);
				}

				if (res.status >= 500) {
					const responseBody = await res.text();
					throw new ProseServiceError(res.status, res.statusText, responseBody, this.endpoint);
				}

				if (!res.ok) {
					const responseBody = await res.text();
					throw new AbortError(
						new ProseServiceError(res.status, res.statusText, responseBody, this.endpoint),
					);
				}

				return res;
			},
			{
				retries: this.maxRetries,
				minTimeout: this.retryMinTimeoutMs,
				factor: 2,
				randomize: true,
				signal,
			},
		);

		const json: unknown = await response.json();
		const completion = ChatCompletionSchema.parse(json);
		return cleanProse(completion.choices[0].message.content);
	}

	private delay(ms: number, signal?: AbortSignal): Promise<void> {
		return new Promise((resolve, reject) => {
			if (signal?.aborted) {
				reject(signal.reason);
				return;
			}
			const onAbort = () => {
				clearTimeout(timer);
				reject(signal?.reason);
			};
			const timer = setTimeout(() => {
				signal?.removeEventListener("abort", onAbort);
				resolve();
			}, ms);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}
