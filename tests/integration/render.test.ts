import { expect } from 'chai';
import { afterEach, beforeEach, describe, it } from 'mocha';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { Writable } from 'stream';
import { fileURLToPath } from 'url';
import YAML from 'yaml';
import { decodeResourceList, discover } from '@fnpipe/core';
import { LocalPackageStore } from '@fnpipe/store';
import { formatPlan } from '../../packages/cli/src/commands/plan/index.ts';
import { Lifecycle } from '../../packages/cli/src/libs/lifecycle.ts';
import { renderAction } from '../../packages/cli/src/commands/render/index.ts';
import { StdoutStore } from '../../packages/cli/src/commands/render/stdout-store.ts';

// Get the directory name of the current module
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const fixture = (name: string) => path.resolve(__dirname, 'fixtures/functions', name);

function functionResource(kind: string, name: string, block: string, extra = ''): string {
  const indented = block
    .split('\n')
    .map(line => (line ? `      ${line}` : line))
    .join('\n');
  return [
    'apiVersion: fn.example.com/v1',
    `kind: ${kind}`,
    'metadata:',
    `  name: ${name}`,
    '  annotations:',
    '    config.kubernetes.io/function: |',
    indented,
  ].join('\n') + extra;
}

const WEB_FILE = 'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: web\n';

describe('Render command', () => {
  let packageDir: string;
  let resultsDir: string;

  beforeEach(async () => {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fnpipe-render-'));
    packageDir = path.join(tmpDir, 'package');
    resultsDir = path.join(tmpDir, 'results');
    await fs.outputFile(
      path.join(packageDir, 'fn.yaml'),
      functionResource('SetLabels', 'set-labels', `module:\n  path: ${fixture('set-labels.ts')}\n`, 'data:\n  team: platform\n')
    );
    await fs.outputFile(
      path.join(packageDir, 'apps/require-owner.yaml'),
      functionResource('RequireOwner', 'require-owner', `module:\n  path: ${fixture('require-owner.ts')}\ndeferFailure: true\n`)
    );
    await fs.outputFile(path.join(packageDir, 'apps/web.yaml'), WEB_FILE);
  });

  afterEach(async () => {
    await fs.remove(path.dirname(packageDir));
  });

  it('should plan nested functions before the root one', async () => {
    const items = await new LocalPackageStore(packageDir).read();

    expect(formatPlan(discover(items))).to.equal(
      `0\tmodule\t${fixture('require-owner.ts')}\tapps\tdeferFailure\n` +
        `1\tmodule\t${fixture('set-labels.ts')}\t.\n`
    );
  });

  it('should render the package, continuing past a deferred failure', async () => {
    const exitCode = await renderAction(packageDir, { enableModule: true, resultsDir });

    expect(exitCode).to.equal(1);
    expect(await fs.readFile(path.join(packageDir, 'apps/web.yaml'), 'utf8')).to.equal(
      'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: web\n  labels:\n    team: platform\n'
    );

    const ownerResults = YAML.parse(await fs.readFile(path.join(resultsDir, 'results-0.yaml'), 'utf8'));
    expect(ownerResults.metadata).to.deep.equal({ name: fixture('require-owner.ts') });
    expect(ownerResults.items).to.deep.equal([
      {
        severity: 'error',
        message: 'ConfigMap web has no owner',
        resourceRef: { apiVersion: 'v1', kind: 'ConfigMap', name: 'web' },
      },
    ]);

    const labelResults = YAML.parse(await fs.readFile(path.join(resultsDir, 'results-1.yaml'), 'utf8'));
    expect(labelResults.items).to.deep.equal([{ severity: 'info', message: 'Labelled 3 resources' }]);
  });

  it('should skip module functions unless they are enabled', async () => {
    const exitCode = await renderAction(packageDir, { resultsDir });

    expect(exitCode).to.equal(0);
    expect(await fs.readFile(path.join(packageDir, 'apps/web.yaml'), 'utf8')).to.equal(WEB_FILE);
    expect(await fs.pathExists(resultsDir)).to.equal(false);
  });

  it('should not finish shutting down before the running render has stopped', async () => {
    await fs.outputFile(
      path.join(packageDir, 'fn.yaml'),
      functionResource('Slow', 'slow', `module:\n  path: ${fixture('slow-function.ts')}\n`)
    );
    const lifecycle = new Lifecycle();
    let settled = false;
    const render = renderAction(packageDir, { enableModule: true }, lifecycle).then(exitCode => {
      settled = true;
      return exitCode;
    });
    await new Promise(resolve => setTimeout(resolve, 300));

    await lifecycle.shutdown();

    expect(settled).to.equal(true);
    expect(await render).to.equal(1);
    expect(await fs.readFile(path.join(packageDir, 'apps/web.yaml'), 'utf8')).to.equal(WEB_FILE);
  });

  it('should print the rendered package instead of writing it', async () => {
    const chunks: string[] = [];
    const out = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString('utf8'));
        callback();
      },
    });
    const store = new StdoutStore(new LocalPackageStore(packageDir), out);

    const items = await store.read();
    await store.write(items.filter(item => item.kind === 'ConfigMap'));

    const printed = decodeResourceList(chunks.join(''));
    expect(printed.ok && printed.value.items.map(item => item.metadata?.name)).to.deep.equal(['web']);
    expect(await fs.readFile(path.join(packageDir, 'apps/web.yaml'), 'utf8')).to.equal(WEB_FILE);
  });
});
