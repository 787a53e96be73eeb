import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { log, logWarn, errorMessage } from '../log';

export const CATEGORY_VOCABULARY = [
  'Agriculture', 'Automotive', 'Boat', 'Beauty', 'Personal Care',
  'Building', 'Construction', 'Communication', 'Media', 'Education',
  'Children', 'Entertainment', 'Recreation', 'Financial Services',
  'Health Care', 'Fitness', 'Manufacturing', 'Non-classifiable Establishments',
  'Online', 'Technology', 'Pet Services', 'Restaurants', 'Food',
  'Retail', 'Service Businesses', 'Real Estate',
] as const;

const VOCABULARY = new Set<string>(CATEGORY_VOCABULARY);

/**
 * Text classification backend. Returns the model's raw JSON text.
 */
export interface ClassificationService {
  complete(system: string, prompt: string): Promise<string>;
}

export interface StructuredLocation {
  city: string;
  state: string;
}

const categoryResponseSchema = z.object({ category: z.array(z.string()) });
const locationResponseSchema = z.object({ city: z.string(), state: z.string() });

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

export class OpenAIClassificationService implements ClassificationService {
  private http: AxiosInstance;

  constructor(apiKey: string, private readonly model = 'gpt-4o-mini', http?: AxiosInstance) {
    this.http = http ?? axios.create({
      baseURL: 'https://api.openai.com/v1',
      timeout: 30000,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
    });
  }

  async complete(system: string, prompt: string): Promise<string> {
    const response = await this.http.post<ChatCompletionResponse>('/chat/completions', {
      model: this.model,
      temperature: 0.3,
      max_tokens: 200,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: prompt },
      ],
    });
    return response.data.choices?.[0]?.message?.content?.trim() ?? '';
  }
}

/** Strips a ```json fence some models wrap around the object. */
export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

function parseWith<T>(schema: z.ZodType<T>, text: string): T | null {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(text));
  } catch {
    return null;
  }
  const result = schema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * "Las Vegas, NV" -> { city: "las vegas", state: "nv" }.
 * Used when the classifier cannot answer.
 */
export function rawLocation(location: string): StructuredLocation {
  const cut = location.lastIndexOf(',');
  if (cut === -1) {
    return { city: location.trim().toLowerCase(), state: '' };
  }
  return {
    city: location.slice(0, cut).trim().toLowerCase(),
    state: location.slice(cut + 1).trim().toLowerCase(),
  };
}

/**
 * Normalizes category and location text. Never throws: every failure falls
 * back to the raw input.
 */
export class EnrichmentClient {
  constructor(private readonly service: ClassificationService) {}

  async categorize(rawCategory: string): Promise<string[]> {
    const fallback = rawCategory ? [rawCategory] : [];
    const prompt = `Analyze this business listing category and categorize it using ONLY the predefined categories below.
You can select multiple categories if applicable. Return ONLY a JSON object with the key "category" whose value is an array of selected categories.

Predefined categories:
${CATEGORY_VOCABULARY.join(', ')}

Business listing category:
Original Category: ${rawCategory}

Return ONLY JSON like this:
{"category": ["Category1", "Category2"]}`;

    try {
      const text = await this.service.complete(
        "You are a business categorization expert. Return only valid JSON with the 'category' key containing an array of categories.",
        prompt,
      );
      const parsed = parseWith(categoryResponseSchema, text);
      if (!parsed) {
        logWarn(`Unparseable category response: ${text.slice(0, 120)}`, 'ENRICH');
        return fallback;
      }

      const valid = Array.from(new Set(parsed.category.filter(c => VOCABULARY.has(c))));
      if (valid.length === 0) {
        logWarn(`No known categories in response: ${parsed.category.join(', ')}`, 'ENRICH');
        return fallback;
      }
      log(`"${rawCategory}" -> ${valid.join(', ')}`, 'ENRICH');
      return valid;
    } catch (error) {
      logWarn(`Categorization failed: ${errorMessage(error)}`, 'ENRICH');
      return fallback;
    }
  }

  async extractLocation(rawLocationText: string): Promise<StructuredLocation> {
    const prompt = `Extract the state and city from this location: ${rawLocationText}.

Do not return abbreviations.
Return your output as JSON like this:
{"state": "oklahoma", "city": "oklahoma city"}`;

    try {
      const text = await this.service.complete('You are a location extraction expert.', prompt);
      const parsed = parseWith(locationResponseSchema, text);
      if (!parsed) {
        logWarn(`Unparseable location response: ${text.slice(0, 120)}`, 'ENRICH');
        return rawLocation(rawLocationText);
      }
      return {
        city: parsed.city.trim().toLowerCase(),
        state: parsed.state.trim().toLowerCase(),
      };
    } catch (error) {
      logWarn(`Location extraction failed: ${errorMessage(error)}`, 'ENRICH');
      return rawLocation(rawLocationText);
    }
  }
}
