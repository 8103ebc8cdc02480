import { expect } from 'chai';
import { describe, it } from 'mocha';
import { defaultPath, reconcile, resolveScope } from '@fnpipe/core';
import { INDEX_ANNOTATION, PATH_ANNOTATION, getIndex, getPath } from '@fnpipe/sdk';
import type { Resource } from '@fnpipe/sdk';
import { configMap, label } from '../helpers/resources.ts';

function reconcileAt(current: Resource[], anchor: string, response: Resource[]): Resource[] {
  return reconcile(current, resolveScope(current, anchor).scoped, response, anchor);
}

describe('Reconciliation', () => {
  it('should replace matches in place, delete dropped resources and append new ones', () => {
    const current = [configMap('a', 'x/a.yaml'), configMap('b', 'x/b.yaml'), configMap('out', 'top.yaml')];
    const changed = label(current[1], 'step', 'one');
    const created: Resource = { apiVersion: 'v1', kind: 'ConfigMap', metadata: { name: 'new' } };

    const merged = reconcileAt(current, 'x', [changed, created]);

    expect(merged.map(item => item.metadata?.name)).to.deep.equal(['b', 'out', 'new']);
    expect(merged[0]).to.equal(changed);
    expect(merged[1]).to.equal(current[2]);
    expect(merged[2].metadata?.annotations).to.deep.equal({
      [PATH_ANNOTATION]: 'x/configmap_new.yaml',
      [INDEX_ANNOTATION]: '0',
    });
  });

  it('should keep the relative order of matched resources as they were', () => {
    const current = [configMap('a', 'a.yaml'), configMap('b', 'b.yaml'), configMap('c', 'c.yaml')];

    const merged = reconcileAt(current, '.', [current[2], current[0], current[1]].map(item => structuredClone(item)));

    expect(merged.map(item => item.metadata?.name)).to.deep.equal(['a', 'b', 'c']);
  });

  it('should let a later duplicate replace an earlier one', () => {
    const current = [configMap('a', 'a.yaml')];
    const first = configMap('a', 'a.yaml', 0, { version: '1' });
    const second = configMap('a', 'a.yaml', 0, { version: '2' });

    const merged = reconcileAt(current, '.', [first, second]);

    expect(merged).to.have.length(1);
    expect(merged[0]).to.equal(second);
  });

  it('should prefer the match that keeps the resource in its file', () => {
    const current = [configMap('a', 'a.yaml')];
    const moved = configMap('a', 'moved.yaml');
    const kept = configMap('a', 'a.yaml', 0, { kept: 'true' });

    const merged = reconcileAt(current, '.', [moved, kept]);

    expect(merged).to.deep.equal([kept, moved]);
  });

  it('should give new resources the next free index of their file', () => {
    const current = [configMap('a', 'a.yaml', 0), configMap('b', 'a.yaml', 1)];
    const created: Resource = {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: { name: 'c', annotations: { [PATH_ANNOTATION]: 'a.yaml' } },
    };

    const merged = reconcileAt(current, '.', [...current.map(item => structuredClone(item)), created]);

    expect(merged.map(getPath)).to.deep.equal(['a.yaml', 'a.yaml', 'a.yaml']);
    expect(merged.map(getIndex)).to.deep.equal([0, 1, 2]);
  });

  it('should not touch resources outside the scope', () => {
    const outside = configMap('outside', 'other/o.yaml');
    delete outside.metadata?.annotations?.[INDEX_ANNOTATION];
    const current = [outside, configMap('inside', 'x/i.yaml')];

    const merged = reconcileAt(current, 'x', []);

    expect(merged).to.deep.equal([outside]);
    expect(getIndex(merged[0])).to.equal(undefined);
  });

  it('should build default paths under the anchor', () => {
    const resource: Resource = { apiVersion: 'apps/v1', kind: 'Deployment', metadata: { name: 'web' } };
    expect(defaultPath(resource, '.')).to.equal('deployment_web.yaml');
    expect(defaultPath(resource, 'apps/web')).to.equal('apps/web/deployment_web.yaml');
  });
});
