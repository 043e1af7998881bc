import type { Language } from '../language/detector.js';
import type { InvalidScriptReason } from './errors.js';
import type { ErrorKind } from './kinds.js';

// Adding a language means adding a column to each of these tables.

export const ERROR_HEADLINES: Record<ErrorKind, Record<Language, string>> = {
  invalid_script: {
    english: '⚠️ Cannot create an image from this script.',
    bangla: '⚠️ এই স্ক্রিপ্ট থেকে ছবি বানানো যাচ্ছে না।',
  },
  backend_rejected: {
    english: '🚫 The image service declined this script.',
    bangla: '🚫 ছবি তৈরির সেবা এই স্ক্রিপ্টটি গ্রহণ করেনি।',
  },
  backend_unavailable: {
    english: '⏳ The image service is unavailable right now. Please try again shortly.',
    bangla: '⏳ ছবি তৈরির সেবা এই মুহূর্তে পাওয়া যাচ্ছে না। একটু পরে আবার চেষ্টা করুন।',
  },
  backend_quota_exceeded: {
    english: '🔑 The image service refused the bot\'s credentials or quota.',
    bangla: '🔑 ছবি তৈরির সেবা বটের অনুমতি বা কোটা গ্রহণ করেনি।',
  },
  unknown: {
    english: '❌ An error occurred!',
    bangla: '❌ একটি ত্রুটি ঘটেছে!',
  },
};

export const INVALID_SCRIPT_DETAILS: Record<InvalidScriptReason, Record<Language, string>> = {
  empty_script: {
    english: 'Please write a script (Bangla or English) describing the picture.',
    bangla: 'দয়া করে ছবির বর্ণনা দিয়ে একটি স্ক্রিপ্ট লিখুন (বাংলা বা ইংরেজি)।',
  },
  no_previous_script: {
    english: 'There is nothing to regenerate yet. Send a script first.',
    bangla: 'আবার বানানোর মতো কিছু নেই। আগে একটি স্ক্রিপ্ট পাঠান।',
  },
  script_too_long: {
    english: 'The script is too long. Please shorten it and send it again.',
    bangla: 'স্ক্রিপ্টটি অনেক বড়। ছোট করে আবার পাঠান।',
  },
};

export const REASON_LABELS: Record<Language, string> = {
  english: 'Reason',
  bangla: 'কারণ',
};

/** /start always greets in English and asks for the script in Bangla. */
export const GREETINGS = {
  welcome: '👋 Welcome {name}!',
  askForScript: '✍️ দয়া করে একটি স্ক্রিপ্ট লিখুন (বাংলা বা ইংরেজি) — আমি সেটি থেকে একটি ছবি বানিয়ে দেব।',
} as const;

export function formatTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => vars[key] ?? match);
}
