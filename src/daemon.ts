import 'dotenv/config';
import * as readline from 'readline';
import { AssistantEngine } from './assistant-engine';
import { loadConfig, type GideonConfig } from './config';
import { HELP_LINES, runConsoleCommand } from './console-commands';
import { ConfigError, TranscriptionError, describeError } from './errors';
import { GroqLanguageModel } from './language-model';
import { PyAudioDeviceEnumerator } from './list-microphones';
import { ConversationLog } from './memory/conversation-log';
import { Lpcm16Microphone } from './microphone';
import { GroqTranscriber } from './transcriber';
import { ConsoleSpeech, TextToSpeech } from './tts';
import type { DeviceEnumerator, SpeechToText } from './types/engine';

let config: GideonConfig;
try {
  config = loadConfig(process.env);
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

const apiKey = config.response.apiKey;
if (!apiKey) {
  console.warn('⚠️  GROQ_API_KEY is not set: speech recognition and generated replies are off, fallback replies only');
}

// Without a key nothing can be transcribed, so the microphone stays closed
const offlineTranscriber: SpeechToText = {
  transcribe: () => Promise.reject(new TranscriptionError(new Error('No GROQ_API_KEY configured'))),
};
const noDevices: DeviceEnumerator = {
  listDevices: () => Promise.resolve([]),
};

const microphone = new Lpcm16Microphone({ frameMs: config.audio.frameMs });

const engine = new AssistantEngine(config, {
  devices: apiKey ? new PyAudioDeviceEnumerator() : noDevices,
  sampler: microphone,
  microphone,
  transcriber: apiKey
    ? new GroqTranscriber({ apiKey, speech: config.speech, vocabulary: ['Gideon'] })
    : offlineTranscriber,
  speech: apiKey ? new TextToSpeech(apiKey, config.speech) : new ConsoleSpeech(),
  model: new GroqLanguageModel(config.response),
  log: config.log.path ? ConversationLog.atPath(config.log.path, config.log.maxTurns) : undefined,
});

engine.on('mode', (event) => {
  if (event.type === 'mode' && event.data === 'text-only') {
    console.log('⌨️  Text mode: type a request and press enter');
  }
});

console.log('🎙️  Gideon voice engine');
console.log('='.repeat(50));

const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
let closing = false;

async function shutdown(code: number) {
  if (closing) return;
  closing = true;
  rl.close();
  try {
    await engine.shutdown();
  } catch (error) {
    console.error(`Shutdown failed: ${describeError(error)}`);
    code = 1;
  }
  process.exit(code);
}

rl.on('line', (line) => {
  runConsoleCommand(engine, line)
    .then((outcome) => {
      outcome.output.forEach((text) => console.log(text));
      if (outcome.quit) return shutdown(0);
    })
    .catch((error: unknown) => {
      console.error(`❌ ${describeError(error)}`);
    });
});

rl.on('close', () => {
  shutdown(0).catch((error: unknown) => console.error(describeError(error)));
});

// Graceful shutdown
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    console.log('\nShutting down...');
    shutdown(0).catch((error: unknown) => console.error(describeError(error)));
  });
}

try {
  await engine.start();
  HELP_LINES.forEach((text) => console.log(text));
} catch (error) {
  console.error(`❌ Failed to start: ${describeError(error)}`);
  await shutdown(1);
}
