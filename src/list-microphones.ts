import { spawn } from "child_process";
import { z } from "zod";
import { abortReason } from "./cancellation";
import type { CaptureDevice, DeviceEnumerator } from "./types/engine";

const PROBE_SCRIPT = `
import pyaudio
import json

p = pyaudio.PyAudio()
devices = []

try:
    default_index = p.get_default_input_device_info()['index']
except Exception:
    default_index = -1

for i in range(p.get_device_count()):
    info = p.get_device_info_by_index(i)
    if info['maxInputChannels'] > 0:
        devices.append({
            'index': i,
            'name': info['name'],
            'sampleRate': int(info['defaultSampleRate']),
            'channels': info['maxInputChannels'],
            'isDefault': i == default_index
        })

print(json.dumps(devices))
p.terminate()
`;

const deviceListSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    name: z.string(),
    sampleRate: z.number().positive(),
    channels: z.number().int().positive(),
    isDefault: z.boolean().default(false),
  })
);

export function parseDeviceList(output: string): CaptureDevice[] {
  const trimmed = output.trim();
  // PyAudio prints ALSA warnings before the JSON line on some hosts
  const jsonLine = trimmed.split("\n").reverse().find((line) => line.trim().startsWith("[")) ?? trimmed;
  return deviceListSchema.parse(JSON.parse(jsonLine));
}

export class PyAudioDeviceEnumerator implements DeviceEnumerator {
  constructor(private readonly command: string = "uvx") {}

  listDevices(signal?: AbortSignal): Promise<CaptureDevice[]> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    return new Promise((resolve, reject) => {
      const probe = spawn(this.command, ["--with", "pyaudio", "python3", "-c", PROBE_SCRIPT]);

      const onAbort = () => {
        probe.kill();
        if (signal) reject(abortReason(signal));
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      let output = "";
      probe.stdout.on("data", (data: Buffer) => {
        output += data.toString();
      });

      probe.on("error", (error) => {
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      });

      probe.on("close", (code) => {
        signal?.removeEventListener("abort", onAbort);
        if (code !== 0) {
          reject(new Error(`Failed to list microphones: exit code ${code}`));
          return;
        }
        try {
          resolve(parseDeviceList(output));
        } catch (error) {
          reject(new Error("Failed to parse microphone list", { cause: error }));
        }
      });
    });
  }
}
