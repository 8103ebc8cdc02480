import { expect } from 'chai';
import { describe, it } from 'mocha';
import { loadConfig } from '@fnpipe/libs';

describe('Configuration', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).to.deep.equal({
      containerRuntime: 'docker',
      functionTimeoutMs: 300000,
      enableExec: false,
      enableModule: false,
      resultsDir: undefined,
    });
  });

  it('should read every variable', () => {
    const config = loadConfig({
      FNPIPE_CONTAINER_RUNTIME: 'podman',
      FNPIPE_FN_TIMEOUT: '1.5',
      FNPIPE_ENABLE_EXEC: 'yes',
      FNPIPE_ENABLE_MODULE: 'TRUE',
      FNPIPE_RESULTS_DIR: '/tmp/results',
    });

    expect(config).to.deep.equal({
      containerRuntime: 'podman',
      functionTimeoutMs: 1500,
      enableExec: true,
      enableModule: true,
      resultsDir: '/tmp/results',
    });
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ FNPIPE_ENABLE_EXEC: 'maybe' })).to.throw('Invalid boolean for FNPIPE_ENABLE_EXEC: maybe');
    expect(() => loadConfig({ FNPIPE_FN_TIMEOUT: '-3' })).to.throw(
      'Invalid number of seconds for FNPIPE_FN_TIMEOUT: -3'
    );
    expect(() => loadConfig({ FNPIPE_CONTAINER_RUNTIME: 'lxc' })).to.throw(
      'Invalid FNPIPE_CONTAINER_RUNTIME: lxc (expected one of docker, podman)'
    );
  });
});
