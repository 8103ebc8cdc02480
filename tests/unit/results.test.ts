import { expect } from 'chai';
import { describe, it } from 'mocha';
import { ResultAggregator, hasErrorResults, maxSeverity } from '@fnpipe/core';

describe('Result Aggregator', () => {
  it('should report the highest severity', () => {
    expect(maxSeverity([])).to.equal(undefined);
    expect(maxSeverity([{ severity: 'info', message: 'a' }, { severity: 'warn', message: 'b' }])).to.equal('warn');
    expect(
      maxSeverity([
        { severity: 'error', message: 'a' },
        { severity: 'info', message: 'b' },
      ])
    ).to.equal('error');
  });

  it('should exit 0 when nothing is worse than a warning', () => {
    const aggregator = new ResultAggregator();
    aggregator.record({ name: 'fn', sequenceIndex: 0, items: [{ severity: 'warn', message: 'careful' }] });
    aggregator.record({ name: 'fn', sequenceIndex: 1, items: [{ severity: 'info', message: 'done' }] });

    expect(aggregator.severity()).to.equal('warn');
    expect(aggregator.finalStatus()).to.equal(0);
  });

  it('should exit 1 on any error result', () => {
    const aggregator = new ResultAggregator();
    aggregator.record({ name: 'fn', sequenceIndex: 0, items: [{ severity: 'error', message: 'broken' }] });

    expect(aggregator.finalStatus()).to.equal(1);
  });

  it('should exit 1 when an invocation was deferred or the run aborted', () => {
    const deferred = new ResultAggregator();
    deferred.markDeferred();
    expect(deferred.deferredCount).to.equal(1);
    expect(deferred.finalStatus()).to.equal(1);

    const aborted = new ResultAggregator();
    aborted.markAborted();
    expect(aborted.isAborted).to.equal(true);
    expect(aborted.finalStatus()).to.equal(1);
  });

  it('should keep result sets in recording order and hand out copies', () => {
    const aggregator = new ResultAggregator();
    aggregator.record({ name: 'first', sequenceIndex: 0, items: [] });
    aggregator.record({ name: 'second', sequenceIndex: 1, items: [{ severity: 'info', message: 'ok' }] });

    const sets = aggregator.resultSets();
    sets[1].items.push({ severity: 'error', message: 'tampered' });

    expect(sets.map(set => set.name)).to.deep.equal(['first', 'second']);
    expect(aggregator.resultSets()[1].items).to.have.length(1);
    expect(aggregator.finalStatus()).to.equal(0);
  });

  it('should find error results in flat and named result lists', () => {
    expect(hasErrorResults({ items: [], results: [{ severity: 'warn', message: 'w' }] })).to.equal(false);
    expect(
      hasErrorResults({
        items: [],
        results: [{ name: 'inner', sequenceIndex: 0, items: [{ severity: 'error', message: 'e' }] }],
      })
    ).to.equal(true);
    expect(hasErrorResults({ items: [] })).to.equal(false);
  });
});
