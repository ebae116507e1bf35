/**
 * Translation Memory — fixed Arabic renderings for trade terms
 *
 * Applied to machine-translated Arabic output (English term left behind by
 * the translator → Arabic), and in reverse on Arabic input before it is
 * translated to English.
 */

export interface TranslationMemoryStats {
  totalTerms: number;
  terms: string[];
}

const DEFAULT_TERMS: ReadonlyArray<[string, string]> = [
  ['sample', 'العينة'],
  ['order', 'الطلب'],
  ['quotation', 'عرض الأسعار'],
  ['bulk tanker', 'ناقل البضائع السائبة'],
  ['ex factory', 'التسليم من المصنع'],
  ['bdt', 'تاكا بنغلاديشي'],
  ['bangladeshi taka', 'تاكا بنغلاديشي'],
  ['taka', 'تاكا'],
  ['bdt (bangladeshi taka)', 'تاكا بنغلاديشي'],
  ['price in bdt', 'السعر بالتاكا البنغلاديشي'],
  ['bangladeshi taka (bdt)', 'تاكا بنغلاديشي'],
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class TranslationMemory {
  private entries: Map<string, string>;

  constructor(terms: ReadonlyArray<[string, string]> = DEFAULT_TERMS) {
    this.entries = new Map(terms.map(([en, ar]) => [en.toLowerCase(), ar]));
  }

  /**
   * English terms → Arabic, longest term first, case-insensitive, whole words only
   */
  apply(text: string): { text: string; applied: Record<string, string> } {
    const applied: Record<string, string> = {};
    let result = text;

    const terms = Array.from(this.entries.keys()).sort((a, b) => b.length - a.length);
    for (const term of terms) {
      const arabic = this.entries.get(term) ?? term;
      const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(term)}(?![\\p{L}\\p{N}])`, 'giu');
      if (pattern.test(result)) {
        pattern.lastIndex = 0;
        result = result.replace(pattern, arabic);
        applied[term] = arabic;
      }
    }

    return { text: result, applied };
  }

  /**
   * Arabic renderings → English terms. When several terms share a rendering
   * the first one registered wins.
   */
  reverse(text: string): { text: string; applied: Record<string, string> } {
    const applied: Record<string, string> = {};
    const byArabic = new Map<string, string>();
    for (const [en, ar] of this.entries) {
      if (!byArabic.has(ar)) byArabic.set(ar, en);
    }

    let result = text;
    const renderings = Array.from(byArabic.keys()).sort((a, b) => b.length - a.length);
    for (const arabic of renderings) {
      if (!result.includes(arabic)) continue;
      const english = byArabic.get(arabic) ?? arabic;
      result = result.split(arabic).join(english);
      applied[arabic] = english;
    }

    return { text: result, applied };
  }

  addEntry(englishTerm: string, arabic?: string): void {
    const key = englishTerm.trim().toLowerCase();
    this.entries.set(key, arabic ?? englishTerm);
    console.log(`[TranslationMemory] Added '${key}' -> '${arabic ?? englishTerm}'`);
  }

  stats(): TranslationMemoryStats {
    return {
      totalTerms: this.entries.size,
      terms: Array.from(this.entries.keys()),
    };
  }
}
