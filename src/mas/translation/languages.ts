/**
 * Supported chat languages and the canned replies sent without translation
 */

export type LanguageCode = 'en' | 'ar' | 'bn';

export const SUPPORTED_LANGUAGES: readonly LanguageCode[] = ['en', 'ar', 'bn'];

export const DEFAULT_LANGUAGE: LanguageCode = 'en';

export const LANGUAGE_NAMES: Readonly<Record<string, LanguageCode>> = {
  arabic: 'ar',
  bangla: 'bn',
  bengali: 'bn',
  english: 'en',
  ar: 'ar',
  bn: 'bn',
  en: 'en',
};

/**
 * Map a human-readable language name (or code) to a supported code
 */
export function normalizeLanguage(language: string | null | undefined): LanguageCode {
  if (!language) return DEFAULT_LANGUAGE;
  return LANGUAGE_NAMES[language.trim().toLowerCase()] ?? DEFAULT_LANGUAGE;
}

export const SIGN_IN_MESSAGES: Readonly<Record<LanguageCode, string>> = {
  en: 'Please sign in or sign up to activate the chatbot.',
  ar: 'يرجى تسجيل الدخول أو الاشتراك لتفعيل الدردشة.',
  bn: 'চ্যাটবট সক্রিয় করতে সাইন ইন বা সাইন আপ করুন।',
};

export const ERROR_MESSAGES: Readonly<Record<LanguageCode, string>> = {
  en: 'Sorry, something went wrong. Please try again.',
  ar: 'عذرًا، حدث خطأ. يرجى المحاولة مرة أخرى.',
  bn: 'দুঃখিত, একটি ত্রুটি ঘটেছে। অনুগ্রহ করে আবার চেষ্টা করুন।',
};
