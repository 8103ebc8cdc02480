import { runtimeName } from '@fnpipe/core';
import type { FunctionRunner, RunContext, RunnerResult, RuntimeDescriptor } from '@fnpipe/core';
import type { FunctionResult, Resource, ResourceList } from '@fnpipe/sdk';

export type Behavior = (request: ResourceList) => RunnerResult | Promise<RunnerResult>;

export interface RecordedCall {
  name: string;
  request: ResourceList;
  context: RunContext;
}

/**
 * In-process runner: each function name maps to a scripted behavior and
 * every call is recorded with a copy of its request
 */
export class FakeRunner implements FunctionRunner {
  readonly calls: RecordedCall[] = [];
  private readonly behaviors: Record<string, Behavior>;

  constructor(behaviors: Record<string, Behavior>) {
    this.behaviors = behaviors;
  }

  get names(): string[] {
    return this.calls.map(call => call.name);
  }

  async run(runtime: RuntimeDescriptor, request: ResourceList, context: RunContext): Promise<RunnerResult> {
    const name = runtimeName(runtime);
    this.calls.push({ name, request: structuredClone(request), context });
    const behavior = this.behaviors[name];
    if (!behavior) {
      throw new Error(`No behavior scripted for ${name}`);
    }
    return behavior(request);
  }
}

export function respond(items: Resource[], exitCode = 0, results?: FunctionResult[]): RunnerResult {
  const response: ResourceList = { items };
  if (results) {
    response.results = results;
  }
  return { response, exitCode, diagnostics: '' };
}

export const passThrough: Behavior = request => respond(request.items);

export function unparsable(exitCode: number, reason: string): Behavior {
  return () => ({ response: { ok: false, reason }, exitCode, diagnostics: '' });
}
