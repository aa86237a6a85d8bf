import { z } from 'zod';
import { ConfigError } from './errors';

export const SUPPORTED_SAMPLE_RATES = [8000, 16000, 22050, 44100, 48000] as const;

export const DEFAULT_WAKE_VARIANTS = [
  'gideon',
  'hey gideon',
  'hi gideon',
  'hello gideon',
  'ok gideon',
  'okay gideon',
  'yo gideon',
  'gideon please',
];

const DEFAULT_SYSTEM_PROMPT =
  'You are Gideon, a helpful voice assistant. Be concise, friendly, and professional. ' +
  'Your replies are spoken aloud, so answer in one to three short sentences without markdown.';

const sampleRateSchema = z
  .number()
  .int()
  .refine((rate) => (SUPPORTED_SAMPLE_RATES as readonly number[]).includes(rate), {
    message: `sample rate must be one of ${SUPPORTED_SAMPLE_RATES.join(', ')}`,
  });

const audioSchema = z
  .object({
    sampleRateHz: sampleRateSchema.default(16000),
    frameMs: z.number().int().positive().default(30),
    listenTimeoutMs: z.number().int().positive().default(3000),
    phraseTimeLimitMs: z.number().int().positive().default(8000),
    trailingSilenceMs: z.number().int().positive().default(800),
    ambientSampleMs: z.number().int().positive().default(300),
    testCaptureMs: z.number().int().positive().default(300),
    energyMultiplier: z.number().positive().default(1.5),
    minEnergyThreshold: z.number().positive().default(100),
    maxEnergyThreshold: z.number().positive().default(4000),
    fallbackEnergyThreshold: z.number().positive().default(300),
    recalibrationIntervalMs: z.number().int().positive().default(60_000),
    failuresBeforeRecalibration: z.number().int().positive().default(3),
    transcriptionTimeoutMs: z.number().int().positive().default(10_000),
    speakTimeoutMs: z.number().int().positive().default(30_000),
    lockTimeoutMs: z.number().int().positive().default(10_000),
    retryDelayMs: z.number().int().nonnegative().default(1000),
    maxRetryDelayMs: z.number().int().nonnegative().default(5000),
  })
  .default({})
  .refine((audio) => audio.minEnergyThreshold <= audio.maxEnergyThreshold, {
    message: 'minEnergyThreshold must not exceed maxEnergyThreshold',
    path: ['minEnergyThreshold'],
  });

const wakeWordSchema = z
  .object({
    variants: z.array(z.string().trim().min(1)).min(1).default(DEFAULT_WAKE_VARIANTS),
    threshold: z.number().min(0).max(1).default(0.75),
  })
  .default({});

const responseSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default('llama-3.1-8b-instant'),
    systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
    requestTimeoutMs: z.number().int().positive().default(5000),
    maxRetries: z.number().int().nonnegative().default(1),
    retryBackoffMs: z.number().int().nonnegative().default(250),
    contextTurns: z.number().int().nonnegative().default(10),
    maxOutputTokens: z.number().int().positive().default(150),
    temperature: z.number().min(0).max(2).default(0.7),
    cacheCapacity: z.number().int().positive().default(50),
    cacheTtlMs: z.number().int().positive().nullable().default(10 * 60_000),
    memoryCapacity: z.number().int().positive().default(10),
  })
  .default({});

const healthSchema = z
  .object({
    probeIntervalMs: z.number().int().positive().default(30_000),
    pingTimeoutMs: z.number().int().positive().default(3000),
    memoryCeilingMb: z.number().positive().default(250),
    audioFailureThreshold: z.number().int().positive().default(2),
    languageModelFailureThreshold: z.number().int().positive().default(2),
    remoteFailureThreshold: z.number().int().positive().default(3),
    minCacheCapacity: z.number().int().positive().default(10),
    minMemoryCapacity: z.number().int().positive().default(4),
    historySize: z.number().int().positive().default(120),
  })
  .default({});

const speechSchema = z
  .object({
    voice: z.string().min(1).default('Basil-PlayAI'),
    playerCommand: z.string().min(1).default(process.platform === 'darwin' ? 'afplay' : 'aplay'),
    speed: z.number().positive().default(1.2),
    transcriptionModel: z.string().min(1).default('whisper-large-v3-turbo'),
    language: z.string().min(2).default('en'),
  })
  .default({});

const logSchema = z
  .object({
    path: z.string().min(1).nullable().default('.memory/gideon-conversation-log.json'),
    maxTurns: z.number().int().positive().default(100),
  })
  .default({});

export const configSchema = z.object({
  audio: audioSchema,
  wakeWord: wakeWordSchema,
  response: responseSchema,
  health: healthSchema,
  speech: speechSchema,
  log: logSchema,
});

export type GideonConfig = z.infer<typeof configSchema>;
export type GideonConfigInput = z.input<typeof configSchema>;

export function createConfig(input: GideonConfigInput = {}): GideonConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  // NaN is left for the schema to reject with a readable message
  return Number(value);
}

function stringFromEnv(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv): GideonConfig {
  return createConfig({
    audio: { sampleRateHz: numberFromEnv(env.GIDEON_SAMPLE_RATE) },
    wakeWord: { threshold: numberFromEnv(env.GIDEON_WAKE_THRESHOLD) },
    response: {
      apiKey: stringFromEnv(env.GROQ_API_KEY),
      model: stringFromEnv(env.GIDEON_MODEL),
    },
    health: { memoryCeilingMb: numberFromEnv(env.GIDEON_MEMORY_CEILING_MB) },
    speech: {
      voice: stringFromEnv(env.GIDEON_VOICE),
      playerCommand: stringFromEnv(env.GIDEON_PLAYER),
    },
    log: { path: stringFromEnv(env.GIDEON_LOG_PATH) },
  });
}
