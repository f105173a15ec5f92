import { parseArgs } from 'node:util';
import { z } from 'zod';

const argsSchema = z.object({
  uri: z.string().url().default('ws://localhost:8080/ws/stream'),
  fps: z.coerce.number().positive().max(120).default(30),
  quality: z.coerce.number().int().min(1).max(100).default(80),
  width: z.coerce.number().int().positive().default(640),
  height: z.coerce.number().int().positive().default(480),
  source: z.enum(['synthetic', 'camera', 'screen']).default('camera'),
  device: z.string().optional(),
  queue: z.coerce.number().int().min(1).default(4),
  maxFailures: z.coerce.number().int().nonnegative().default(150),
  statusMs: z.coerce.number().int().nonnegative().default(5000),
});

export type AgentOptions = z.infer<typeof argsSchema>;

export const AGENT_USAGE = `Usage: framecast-agent [options]

  --uri <ws-url>        relay ingest endpoint (default ws://localhost:8080/ws/stream)
  --fps <n>             capture rate (default 30)
  --quality <1-100>     JPEG quality (default 80)
  --width <px>          frame width (default 640)
  --height <px>         frame height (default 480)
  --source <kind>       synthetic | camera | screen (default camera)
  --screen              shorthand for --source screen
  --device <id>         camera device, display or screen index
  --queue <n>           upload queue capacity (default 4)
  --max-failures <n>    consecutive failed captures before giving up, 0 = never (default 150)
  --status-ms <ms>      status log interval, 0 disables (default 5000)
  --help                show this message`;

export class AgentArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentArgsError';
  }
}

const FLAG_NAMES: Record<string, string> = {
  maxFailures: 'max-failures',
  statusMs: 'status-ms',
};

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        uri: { type: 'string' },
        fps: { type: 'string' },
        quality: { type: 'string' },
        width: { type: 'string' },
        height: { type: 'string' },
        source: { type: 'string' },
        screen: { type: 'boolean' },
        device: { type: 'string' },
        queue: { type: 'string' },
        'max-failures': { type: 'string' },
        'status-ms': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (error) {
    throw new AgentArgsError(error instanceof Error ? error.message : String(error));
  }
}

export function parseAgentArgs(argv: string[]): AgentOptions | 'help' {
  const values = readArgv(argv);
  if (values.help) return 'help';

  const parsed = argsSchema.safeParse({
    uri: values.uri,
    fps: values.fps,
    quality: values.quality,
    width: values.width,
    height: values.height,
    source: values.screen ? 'screen' : values.source,
    device: values.device,
    queue: values.queue,
    maxFailures: values['max-failures'],
    statusMs: values['status-ms'],
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (!issue) throw new AgentArgsError('Invalid arguments');
    const key = String(issue.path[0] ?? '');
    throw new AgentArgsError(`--${FLAG_NAMES[key] ?? key}: ${issue.message}`);
  }
  return parsed.data;
}
