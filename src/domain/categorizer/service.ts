import { z } from 'zod';
import keywordData from './keywords.json';

export const OTHER_CATEGORY = 'other';

const keywordMapSchema = z.record(z.string(), z.array(z.string().min(1)).nonempty());

const keywordFileSchema = z.object({
  symptoms: keywordMapSchema,
  concerns: keywordMapSchema,
});

export type KeywordMap = z.infer<typeof keywordMapSchema>;

/**
 * Maps free text to canonical category tags.
 */
export interface TextCategorizer {
  categorizeSymptoms(text: string | null | undefined): string[];
  categorizeConcerns(text: string | null | undefined): string[];
}

/**
 * Keyword categorizer: lower-cased substring match against a keyword map.
 * Blank input yields no categories; text that matches nothing is "other".
 * Output is sorted so equal input always gives equal output.
 */
export class KeywordTextCategorizer implements TextCategorizer {
  private readonly symptomKeywords: Array<[string, string[]]>;
  private readonly concernKeywords: Array<[string, string[]]>;

  constructor(maps: { symptoms: KeywordMap; concerns: KeywordMap } = keywordFileSchema.parse(keywordData)) {
    this.symptomKeywords = normalizeMap(maps.symptoms);
    this.concernKeywords = normalizeMap(maps.concerns);
  }

  categorizeSymptoms(text: string | null | undefined): string[] {
    return categorize(text, this.symptomKeywords);
  }

  categorizeConcerns(text: string | null | undefined): string[] {
    return categorize(text, this.concernKeywords);
  }
}

function normalizeMap(map: KeywordMap): Array<[string, string[]]> {
  return Object.entries(map).map(([category, keywords]) => [
    category,
    keywords.map((k) => k.toLowerCase()),
  ]);
}

function categorize(text: string | null | undefined, keywordMap: Array<[string, string[]]>): string[] {
  if (!text || text.trim().length === 0) {
    return [];
  }

  const normalized = text.toLowerCase();
  const categories = keywordMap
    .filter(([, keywords]) => keywords.some((keyword) => normalized.includes(keyword)))
    .map(([category]) => category);

  if (categories.length === 0) {
    return [OTHER_CATEGORY];
  }

  return categories.sort();
}
