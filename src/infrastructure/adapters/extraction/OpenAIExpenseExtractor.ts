import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { ExtractedExpenseSchema, ExtractionResult, PromptPart } from '../../../application/dto/ExtractionResultDTO.js';
import { ExpenseExtractorPort } from '../../../application/ports/ExpenseExtractorPort.js';
import { EXPENSE_CATEGORIES, EXTRACTION_ERROR_CATEGORY, isExpenseCategory } from '../../../domain/entities/Expense.js';

export const EXTRACTION_FAILED_DESCRIPTION = 'Failed to process input.';

export const SYSTEM_INSTRUCTION = `You are an expert expense tracker API. Your sole function is to extract details from the provided image or text and return a single, valid JSON object.
RULES:
1. Category MUST be one of: ${EXPENSE_CATEGORIES.map((category) => `'${category}'`).join(', ')}.
2. Amount MUST be a string containing ONLY the total numerical value (e.g., "150.75"). Do NOT include the currency symbol. Always find the final TOTAL.
3. Description should be a brief, one-line summary.
4. If extraction fails, return: {"Category": "${EXTRACTION_ERROR_CATEGORY}", "Description": "${EXTRACTION_FAILED_DESCRIPTION}", "Amount": "0.00"}`;

export const EXPENSE_RESPONSE_SCHEMA: Record<string, unknown> = {
  type: 'object',
  properties: {
    Category: { type: 'string', enum: [...EXPENSE_CATEGORIES, EXTRACTION_ERROR_CATEGORY] },
    Description: { type: 'string' },
    Amount: { type: 'string' },
  },
  required: ['Category', 'Description', 'Amount'],
  additionalProperties: false,
};

/** The slice of the OpenAI SDK this adapter calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIExpenseExtractorConfig {
  model: string;
}

const failure = (reason: string): ExtractionResult => ({ ok: false, reason });

const toContentPart = (part: PromptPart): ChatCompletionContentPart =>
  part.type === 'image'
    ? { type: 'image_url', image_url: { url: `data:${part.mimeType};base64,${part.data.toString('base64')}` } }
    : { type: 'text', text: part.text };

const parseJson = (content: string): unknown => {
  try {
    return JSON.parse(content);
  } catch {
    return undefined;
  }
};

export class OpenAIExpenseExtractor implements ExpenseExtractorPort {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly config: OpenAIExpenseExtractorConfig,
  ) {}

  async extract(parts: PromptPart[]): Promise<ExtractionResult> {
    let response: ChatCompletion;

    try {
      response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: SYSTEM_INSTRUCTION },
          { role: 'user', content: parts.map(toContentPart) },
        ],
        response_format: {
          type: 'json_schema',
          json_schema: { name: 'expense', strict: true, schema: EXPENSE_RESPONSE_SCHEMA },
        },
        temperature: 0,
      });
    } catch (error) {
      console.error('❌ Extraction request failed:', error instanceof Error ? error.message : error);
      return failure('The extraction service could not be reached. Please try again later.');
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      console.log('❌ No content in extraction response');
      return failure(EXTRACTION_FAILED_DESCRIPTION);
    }

    const parsed = ExtractedExpenseSchema.safeParse(parseJson(content));
    if (!parsed.success) {
      console.log('❌ Extraction response did not match the expense schema');
      return failure(EXTRACTION_FAILED_DESCRIPTION);
    }

    const { Category, Description, Amount } = parsed.data;

    if (Category === EXTRACTION_ERROR_CATEGORY) {
      return failure(Description.trim() || EXTRACTION_FAILED_DESCRIPTION);
    }

    return {
      ok: true,
      category: isExpenseCategory(Category) ? Category : 'Other',
      description: Description.trim(),
      amount: Amount,
    };
  }
}
