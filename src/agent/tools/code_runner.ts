import vm from 'vm';
import { inspect } from 'util';
import { z } from 'zod';
import { Tool, ToolParameters } from './base';
import { CodeRunnerConfig } from '../../config/schema';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Tools:run_code' });

const RunCodeArgs = z.object({
  code: z.string().min(1),
});

type RunCodeParams = z.infer<typeof RunCodeArgs>;

// Errors thrown inside the context come from its own realm, so instanceof Error does not hold.
function describeFailure(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    const name = 'name' in err && typeof err.name === 'string' ? err.name : 'Error';
    return `${name}: ${err.message}`;
  }
  return String(err);
}

function render(value: unknown): string {
  return typeof value === 'string' ? value : inspect(value, { depth: 4, breakLength: Infinity });
}

/**
 * Developer utility: runs a JavaScript snippet in a fresh vm context with a
 * captured console and a timeout. The denylist is a substring check and the
 * vm module is not an isolation boundary, so this stays off unless
 * `tools.code_runner.enabled` is set.
 */
export class RunCodeTool extends Tool<RunCodeParams> {
  get name() { return 'run_code'; }
  get description() {
    return 'Execute a short JavaScript snippet for calculations or data analysis. Math, JSON and Date are available; use console.log to print results.';
  }
  get parameters(): ToolParameters {
    return {
      type: 'object',
      properties: {
        code: { type: 'string', description: 'JavaScript code to execute' },
      },
      required: ['code'],
    };
  }

  protected get argsSchema() {
    return RunCodeArgs;
  }

  constructor(private config: CodeRunnerConfig) {
    super();
  }

  async execute(params: RunCodeParams): Promise<string> {
    const blocked = this.config.denylist.find(word => params.code.includes(word));
    if (blocked) {
      log.warn(`Rejected snippet containing '${blocked}'`);
      return `Error: Code contains restricted operation '${blocked}'. Only basic math and data operations are allowed.`;
    }

    const stdout: string[] = [];
    const stderr: string[] = [];
    const capture = (sink: string[]) => (...args: unknown[]) => {
      sink.push(args.map(render).join(' '));
    };
    const sandbox = {
      console: {
        log: capture(stdout),
        info: capture(stdout),
        warn: capture(stderr),
        error: capture(stderr),
      },
    };

    try {
      vm.runInNewContext(params.code, sandbox, {
        timeout: this.config.timeout_ms,
        filename: 'snippet.js',
      });
    } catch (err) {
      const failure = describeFailure(err);
      log.info(`Snippet failed: ${failure}`);
      return `Error executing code:\n${failure}`;
    }

    const output = stdout.join('\n');
    if (stderr.length > 0) {
      return `Execution completed with warnings:\n${stderr.join('\n')}\n\nOutput:\n${output}`;
    }
    if (output) {
      return `Execution successful:\n${output}`;
    }
    return 'Code executed successfully (no output produced).';
  }
}
