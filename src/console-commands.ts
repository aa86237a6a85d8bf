import type { AssistantEngine, EngineStats } from './assistant-engine';
import { describeError } from './errors';
import type { HealthStatus } from './types/engine';

export type ConsoleEngine = Pick<
  AssistantEngine,
  'getStatus' | 'getMode' | 'getStats' | 'getHealth' | 'recalibrate' | 'probe' | 'submitText' | 'shutdown'
>;

export interface CommandOutcome {
  output: string[];
  quit: boolean;
}

export const HELP_LINES = [
  'Type a request, or one of:',
  '  /status       loop state and mode',
  '  /stats        recognition, wake word, latency and cache counters',
  '  /health       last health probe',
  '  /probe        run a health probe now',
  '  /recalibrate  re-measure the microphone',
  '  /quit         shut down',
];

const percent = (ratio: number) => `${(ratio * 100).toFixed(0)}%`;

export function formatHealth(status: HealthStatus | null): string[] {
  if (!status) return ['No health probe has completed yet'];

  const lines = [`Health at ${new Date(status.checkedAt).toLocaleTimeString('en-US')}:`];
  for (const [name, component] of Object.entries(status.components)) {
    lines.push(`  ${name.padEnd(15)} ${component.state.padEnd(9)} ${component.detail}`);
  }

  const flags = Object.entries(status.flags)
    .filter(([, raised]) => raised)
    .map(([flag]) => flag);
  if (flags.length > 0) lines.push(`  flags: ${flags.join(', ')}`);
  return lines;
}

export function formatStats(stats: EngineStats): string[] {
  const { voiceLoop, responses, cache } = stats;
  return [
    `Recognition success: ${percent(stats.recognitionSuccessRate)} (${voiceLoop.successfulRecognitions} ok, ${voiceLoop.failures} failed, ${voiceLoop.recognitionTimeouts} silent)`,
    `Wake word hits: ${stats.wakeWordHits} (${voiceLoop.wakeWordMisses} ignored)`,
    `Replies: ${responses.requests} (${responses.cacheHits} cache, ${responses.remoteReplies} remote, ${responses.fallbackReplies} fallback)`,
    `Average response latency: ${stats.averageResponseLatencyMs.toFixed(0)}ms`,
    `Cache: ${cache.size}/${cache.capacity}, hit rate ${percent(stats.cacheHitRate)}`,
    `Memory: peak ${stats.memory.peakMb.toFixed(0)}MB, average ${stats.memory.averageMb.toFixed(0)}MB`,
    `Recalibrations: ${voiceLoop.recalibrations}, conversation turns held: ${stats.conversationTurns}`,
  ];
}

export async function runConsoleCommand(engine: ConsoleEngine, line: string): Promise<CommandOutcome> {
  const input = line.trim();
  if (!input) return { output: [], quit: false };

  if (!input.startsWith('/')) {
    try {
      await engine.submitText(input);
      return { output: [], quit: false };
    } catch (error) {
      return { output: [`❌ ${describeError(error)}`], quit: false };
    }
  }

  switch (input.toLowerCase()) {
    case '/status':
      return { output: [`State: ${engine.getStatus()}, mode: ${engine.getMode()}`], quit: false };
    case '/stats':
      return { output: formatStats(engine.getStats()), quit: false };
    case '/health':
      return { output: formatHealth(engine.getHealth()), quit: false };
    case '/probe':
      return { output: formatHealth(await engine.probe()), quit: false };
    case '/recalibrate': {
      try {
        const session = await engine.recalibrate();
        return {
          output: [
            session.enabled
              ? `🎤 ${session.deviceName ?? `device ${session.deviceId}`}, threshold ${session.energyThreshold.toFixed(0)}`
              : '⚠️  No capture device found, staying in text mode',
          ],
          quit: false,
        };
      } catch (error) {
        return { output: [`❌ Recalibration failed: ${describeError(error)}`], quit: false };
      }
    }
    case '/quit':
    case '/exit':
      await engine.shutdown();
      return { output: ['👋 Goodbye'], quit: true };
    case '/help':
      return { output: HELP_LINES, quit: false };
    default:
      return { output: [`Unknown command ${input}`, ...HELP_LINES], quit: false };
  }
}
