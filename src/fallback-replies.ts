import { z } from 'zod';
import replyData from './data/fallback-replies.json';
import { normalizeTranscript } from './wake-word-matcher';

export const FALLBACK_CATEGORIES = [
  'time',
  'date',
  'weather',
  'identity',
  'help',
  'thanks',
  'farewell',
  'greeting',
  'unclear',
  'unknown',
] as const;

export type FallbackCategory = (typeof FALLBACK_CATEGORIES)[number];

export type ReplyPools = Readonly<Record<FallbackCategory, readonly string[]>>;

const pool = z.array(z.string().min(1)).min(1);
const replyPoolsSchema = z.object({
  time: pool,
  date: pool,
  weather: pool,
  identity: pool,
  help: pool,
  thanks: pool,
  farewell: pool,
  greeting: pool,
  unclear: pool,
  unknown: pool,
});

export const DEFAULT_REPLY_POOLS: ReplyPools = replyPoolsSchema.parse(replyData);

// First matching rule wins, so specific topics come before small talk
const RULES: ReadonlyArray<{ category: FallbackCategory; pattern: RegExp }> = [
  { category: 'time', pattern: /\b(what time|the time|time is it|current time)\b/ },
  { category: 'date', pattern: /\b(date|what day|which day|day is it|day is today)\b/ },
  { category: 'weather', pattern: /\b(weather|forecast|temperature|rain|raining|snow|snowing|sunny)\b/ },
  { category: 'identity', pattern: /\b(who are you|your name|what are you)\b/ },
  { category: 'help', pattern: /\b(help|what can you do)\b/ },
  { category: 'thanks', pattern: /\b(thanks|thank you|cheers)\b/ },
  { category: 'farewell', pattern: /\b(bye|goodbye|good night|see you|farewell)\b/ },
  { category: 'greeting', pattern: /\b(hello|hi|hey|howdy|greetings|good morning|good afternoon|good evening)\b/ },
];

export function classify(text: string): FallbackCategory {
  const normalized = normalizeTranscript(text);
  if (normalized.length === 0) return 'unclear';

  for (const rule of RULES) {
    if (rule.pattern.test(normalized)) return rule.category;
  }
  return 'unknown';
}

export function formatSpokenTime(now: Date): string {
  return now.toLocaleTimeString('en-US', { hour: 'numeric', minute: '2-digit' });
}

export function formatSpokenDate(now: Date): string {
  return now.toLocaleDateString('en-US', { weekday: 'long', month: 'long', day: 'numeric', year: 'numeric' });
}

export function pickReply(
  category: FallbackCategory,
  random: () => number = Math.random,
  now: Date = new Date(),
  pools: ReplyPools = DEFAULT_REPLY_POOLS
): string {
  const replies = pools[category];
  const index = Math.min(replies.length - 1, Math.max(0, Math.floor(random() * replies.length)));
  const template = replies[index] ?? pools.unknown[0] ?? '';

  return template
    .replace(/\{time\}/g, formatSpokenTime(now))
    .replace(/\{date\}/g, formatSpokenDate(now));
}
