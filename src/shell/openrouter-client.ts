import { z } from "zod/v4";

export type Message =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string(),
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
});

export type ChatCompletionResponse = z.infer<typeof chatCompletionSchema>;

export interface CallOptions {
  baseUrl?: string;
  signal?: AbortSignal;
  /** Sampling temperature; classification and planning use 0. */
  temperature?: number;
}

export async function callOpenRouter(
  messages: Message[],
  model: string,
  apiKey: string,
  options: CallOptions = {},
): Promise<ChatCompletionResponse> {
  const url = `${options.baseUrl ?? "https://openrouter.ai/api/v1"}/chat/completions`;
  const body: Record<string, unknown> = { model, messages };
  if (options.temperature !== undefined) {
    body.temperature = options.temperature;
  }

  const res = await fetch(url, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
    signal: options.signal,
  });

  if (!res.ok) {
    throw new Error(`HTTP ${res.status} from ${url}`);
  }

  const parsed = chatCompletionSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new Error(`Unexpected chat completion payload from ${url}`);
  }
  return parsed.data;
}

/** Sends one system + user exchange and returns the assistant's text. */
export async function complete(
  system: string,
  user: string,
  model: string,
  apiKey: string,
  options: CallOptions = {},
): Promise<string> {
  const response = await callOpenRouter(
    [
      { role: "system", content: system },
      { role: "user", content: user },
    ],
    model,
    apiKey,
    options,
  );
  return response.choices[0]?.message.content ?? "";
}
