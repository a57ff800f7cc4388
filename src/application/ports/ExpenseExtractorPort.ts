import { ExtractionResult, PromptPart } from '../dto/ExtractionResultDTO.js';

export interface ExpenseExtractorPort {
  extract(parts: PromptPart[]): Promise<ExtractionResult>;
}
