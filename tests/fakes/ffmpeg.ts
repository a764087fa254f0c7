/**
 * In-process stand-in for fluent-ffmpeg. Tests register it with
 * `vi.mock("fluent-ffmpeg", ...)` and drive it through `ffmpegState`.
 */

type Handler = (...args: unknown[]) => void;

export interface Invocation {
  input?: string;
  options: string[];
  output?: string;
  ffmpegPath?: string;
  ffprobePath?: string;
}

interface FakeCommand {
  setFfmpegPath(path: string): FakeCommand;
  setFfprobePath(path: string): FakeCommand;
  outputOptions(options: string[]): FakeCommand;
  output(target: string): FakeCommand;
  on(event: string, handler: Handler): FakeCommand;
  run(): void;
  getAvailableFormats(callback: (err: Error | null, formats: Record<string, unknown>) => void): void;
  ffprobe(callback: (err: unknown, data: unknown) => void): void;
}

interface FfmpegState {
  available: boolean;
  formatChecks: number;
  invocations: Invocation[];
  probes: Invocation[];
  onRun: (invocation: Invocation) => Promise<void>;
  probeError: Error | null;
  probeData: unknown;
}

export const ffmpegState: FfmpegState = {
  available: true,
  formatChecks: 0,
  invocations: [],
  probes: [],
  onRun: async () => {},
  probeError: null,
  probeData: undefined,
};

export function resetFfmpegState(): void {
  ffmpegState.available = true;
  ffmpegState.formatChecks = 0;
  ffmpegState.invocations = [];
  ffmpegState.probes = [];
  ffmpegState.onRun = async () => {};
  ffmpegState.probeError = null;
  ffmpegState.probeData = undefined;
}

export function fakeFfmpeg(input?: string): FakeCommand {
  const invocation: Invocation = { input, options: [] };
  const handlers = new Map<string, Handler>();

  const command: FakeCommand = {
    setFfmpegPath(path) {
      invocation.ffmpegPath = path;
      return command;
    },
    setFfprobePath(path) {
      invocation.ffprobePath = path;
      return command;
    },
    outputOptions(options) {
      invocation.options.push(...options);
      return command;
    },
    output(target) {
      invocation.output = target;
      return command;
    },
    on(event, handler) {
      handlers.set(event, handler);
      return command;
    },
    run() {
      ffmpegState.invocations.push(invocation);
      handlers.get("start")?.(`ffmpeg -i ${invocation.input ?? ""}`);
      void ffmpegState.onRun(invocation).then(
        () => handlers.get("end")?.(),
        (err: unknown) => handlers.get("error")?.(err),
      );
    },
    getAvailableFormats(callback) {
      ffmpegState.formatChecks++;
      if (ffmpegState.available) callback(null, {});
      else callback(new Error("Cannot find ffmpeg"), {});
    },
    ffprobe(callback) {
      ffmpegState.probes.push(invocation);
      callback(ffmpegState.probeError, ffmpegState.probeData);
    },
  };

  return command;
}
