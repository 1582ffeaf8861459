import { expect } from 'chai';
import { Source } from 'graphql';
import { describe, it } from 'mocha';

import { captureLogs } from '../__testUtils__/captureLogs.js';
import { dedent } from '../__testUtils__/dedent.js';
import { testMetadata } from '../__testUtils__/testSchema.js';

import { compile } from '../compile.js';
import { DepthLimitError } from '../error/errors.js';
import { printQueryPlan } from '../plan/printQueryPlan.js';

describe('compile', () => {
  it('compiles the named operation of a document', () => {
    const { logger, records } = captureLogs('debug');

    const result = compile({
      source: 'query A { version } query B { hero { id } }',
      operationName: 'B',
      metadata: testMetadata,
      logger,
    });

    expect(result.document.definitions).to.have.lengthOf(2);
    expect(result.operation.name).to.equal('B');
    expect(printQueryPlan(result.plan)).to.equal(dedent`
      Operation: query B
        Parallel:
          Composite 'hero' (Query.hero: Character):
            Parallel:
              Resolver 'hero.id' (Character.id: ID!)
    `);

    expect(records.map((record) => record.msg)).to.deep.equal([
      'operation prepared',
      'query plan built',
    ]);
    expect(records[0]).to.deep.include({
      level: 20,
      operationName: 'B',
      fragments: [],
    });
    expect(records[1]).to.deep.include({
      level: 20,
      operationName: 'B',
      operationType: 'query',
      deferred: 0,
      streams: 0,
    });
  });

  it('accepts a source object', () => {
    const result = compile({
      source: new Source('{ ...F }\nfragment F on Query { version }', 'F.graphql'),
      metadata: testMetadata,
    });

    expect([...result.operation.fragments.keys()]).to.deep.equal(['F']);
    expect(printQueryPlan(result.plan)).to.equal(dedent`
      Operation: query
        Parallel:
          Resolver 'version' (Query.version: String)
    `);
  });

  it('passes parse options to the parser', () => {
    expect(() =>
      compile({
        source: '{ hero { id } }',
        metadata: testMetadata,
        parseOptions: { maxDepth: 1 },
      }),
    ).to.throw(DepthLimitError, 'Document nesting exceeds');
  });
});
