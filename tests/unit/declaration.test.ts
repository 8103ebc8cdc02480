import { expect } from 'chai';
import { describe, it } from 'mocha';
import { DeclarationParseError, parseDeclaration, runtimeName } from '@fnpipe/core';
import { configMap, declaration } from '../helpers/resources.ts';

function parseBlock(block: string) {
  return parseDeclaration(declaration('fn', 'fn.yaml', block));
}

function parseError(block: string): DeclarationParseError {
  try {
    parseBlock(block);
  } catch (err) {
    if (err instanceof DeclarationParseError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected a DeclarationParseError');
}

describe('Function declarations', () => {
  it('should return undefined for resources that declare nothing', () => {
    expect(parseDeclaration(configMap('plain', 'plain.yaml'))).to.equal(undefined);
  });

  it('should parse exec declarations', () => {
    const parsed = parseBlock('exec:\n  path: ./bin/fn\n  args: [--strict]\n');
    expect(parsed?.runtime).to.deep.equal({ kind: 'exec', path: './bin/fn', args: ['--strict'], env: [] });
    expect(parsed?.deferFailure).to.equal(false);
  });

  it('should parse module declarations with a named export', () => {
    const parsed = parseBlock('module:\n  path: ./fn.ts\n  export: transform\n');
    expect(parsed?.runtime).to.deep.equal({ kind: 'module', path: './fn.ts', exportName: 'transform' });
    expect(parsed && runtimeName(parsed.runtime)).to.equal('./fn.ts#transform');
  });

  it('should parse http declarations', () => {
    const parsed = parseBlock('http:\n  url: http://127.0.0.1:3000/execute\n');
    expect(parsed?.runtime).to.deep.equal({ kind: 'http', url: 'http://127.0.0.1:3000/execute' });
  });

  it('should parse container mounts', () => {
    const parsed = parseBlock('container:\n  image: fn\n  mounts:\n    - type: bind\n      src: /data\n      dst: /in\n');
    expect(parsed?.runtime).to.deep.equal({
      kind: 'container',
      image: 'fn',
      network: false,
      env: [],
      mounts: [{ type: 'bind', src: '/data', dst: '/in', rw: false }],
    });
  });

  it('should freeze the declaration source', () => {
    const parsed = parseBlock('container:\n  image: fn\n');
    expect(Object.isFrozen(parsed?.source)).to.equal(true);
    expect(Object.isFrozen(parsed?.source.metadata)).to.equal(true);
  });

  it('should require a runtime', () => {
    const error = parseError('deferFailure: true\n');
    expect(error.code).to.equal('DECLARATION_PARSE');
    expect(error.message).to.equal(
      'Invalid function declaration on v1/ConfigMap//fn: one of container, exec, module, http is required'
    );
  });

  it('should reject annotations that are not a mapping', () => {
    expect(parseError('- container\n').message).to.equal(
      'Invalid function declaration on v1/ConfigMap//fn: annotation must be a mapping'
    );
  });

  it('should reject invalid YAML', () => {
    expect(parseError('container: [').message).to.match(
      /^Invalid function declaration on v1\/ConfigMap\/\/fn: annotation is not valid YAML: /
    );
  });

  it('should reject unknown keys and bad values', () => {
    expect(parseError('container:\n  image: fn\n  privileged: true\n').resource).to.equal('v1/ConfigMap//fn');
    expect(parseError('container:\n  image: fn\ndeferFailure: "yes"\n').message).to.match(/deferFailure: /);
    expect(parseError('http:\n  url: not a url\n').message).to.match(/http\.url: /);
  });
});
