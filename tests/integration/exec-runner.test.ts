import { expect } from 'chai';
import { describe, it } from 'mocha';
import path from 'path';
import { fileURLToPath } from 'url';
import { RunnerInvocationError } from '@fnpipe/core';
import type { ExecRuntime, RunContext } from '@fnpipe/core';
import type { ResourceList } from '@fnpipe/sdk';
import { ExecRunner } from '@fnpipe/runtime';

// Get the directory name of the current module
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const workDir = path.resolve(__dirname, 'fixtures/exec');

function script(mode: string, env: string[] = []): ExecRuntime {
  return { kind: 'exec', path: process.execPath, args: ['./annotate.mjs', mode], env };
}

const request: ResourceList = {
  apiVersion: 'config.kubernetes.io/v1',
  kind: 'ResourceList',
  items: [{ apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'web' } }],
};

async function runError(runtime: ExecRuntime, context: RunContext): Promise<unknown> {
  try {
    await new ExecRunner().run(runtime, request, context);
  } catch (err) {
    return err;
  }
  throw new Error('Expected the run to fail');
}

describe('Exec runner', () => {
  it('should exchange ResourceLists over stdin and stdout', async () => {
    const result = await new ExecRunner().run(script('annotate', ['SEEN_BY=test']), request, { workDir });

    expect(result.exitCode).to.equal(0);
    expect(result.response).to.deep.equal({
      apiVersion: 'config.kubernetes.io/v1',
      kind: 'ResourceList',
      items: [
        { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'web', annotations: { 'example.com/seen': 'test' } } },
      ],
    });
  });

  it('should report the exit code and stderr of a failing function', async () => {
    const result = await new ExecRunner().run(script('fail'), request, { workDir });

    expect(result.exitCode).to.equal(2);
    expect(result.diagnostics).to.equal('validation failed\n');
    expect(result.response).to.have.property('items').with.length(1);
  });

  it('should report output that is not a ResourceList', async () => {
    const result = await new ExecRunner().run(script('garbage'), request, { workDir });

    expect(result.exitCode).to.equal(0);
    expect(result.response).to.deep.equal({ ok: false, reason: 'output is not a mapping' });
  });

  it('should kill functions that run too long', async () => {
    const err = await runError(script('hang'), { workDir, timeoutMs: 200 });

    expect(err).to.be.instanceOf(RunnerInvocationError);
    expect(err).to.have.property('message', `${process.execPath} timed out after 0.2 seconds`);
  });

  it('should kill functions when the run is cancelled', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const err = await runError(script('hang'), { workDir, signal: controller.signal });

    expect(err).to.have.property('message', `${process.execPath} cancelled`);
  });

  it('should report executables that cannot be started', async () => {
    const err = await runError({ kind: 'exec', path: './missing-fn', args: [], env: [] }, { workDir });

    expect(err).to.be.instanceOf(RunnerInvocationError);
    expect(err).to.have.property('message').that.matches(/^Failed to start .*missing-fn: /);
  });
});
