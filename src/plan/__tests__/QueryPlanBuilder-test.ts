import { expect } from 'chai';
import { buildSchema } from 'graphql';
import { invariant } from 'graphql/jsutils/invariant.js';
import { describe, it } from 'mocha';
import sinon from 'sinon';

import { captureLogs } from '../../__testUtils__/captureLogs.js';
import { catchError } from '../../__testUtils__/catchError.js';
import { dedent } from '../../__testUtils__/dedent.js';
import { testMetadata, testSchema } from '../../__testUtils__/testSchema.js';

import {
  InvalidSubscriptionSelectionError,
  NullabilityModifierError,
  UnknownFieldError,
  UnknownTypeError,
} from '../../error/errors.js';
import { parse } from '../../language/parser.js';
import type { Logger } from '../../logger.js';
import { resolveOperation } from '../../operation/resolveOperation.js';

import type { FieldMetadataProvider } from '../FieldMetadata.js';
import { printQueryPlan } from '../printQueryPlan.js';
import { buildQueryPlan, createQueryPlan } from '../QueryPlanBuilder.js';
import type {
  PlanField,
  QueryPlan,
  QueryPlanNode,
} from '../QueryPlanNode.js';
import { createSchemaFieldMetadataProvider } from '../schemaFieldMetadata.js';

function plan(
  source: string,
  metadata: FieldMetadataProvider = testMetadata,
  logger?: Logger,
): QueryPlan {
  return buildQueryPlan(resolveOperation(parse(source)), metadata, { logger });
}

function printPlan(source: string): string {
  return printQueryPlan(plan(source));
}

function collectPlanFields(node: QueryPlanNode | undefined): Array<PlanField> {
  if (node === undefined) {
    return [];
  }
  switch (node.kind) {
    case 'Operation':
      return collectPlanFields(node.node);
    case 'Serial':
    case 'Parallel':
      return node.nodes.flatMap((child) => collectPlanFields(child));
    case 'Resolver':
      return [node.field];
    case 'Composite':
    case 'Subscription':
      return [node.field, ...collectPlanFields(node.node)];
    case 'Stream':
      return collectPlanFields(node.node);
    case 'Defer':
      return [
        ...collectPlanFields(node.node),
        ...node.deferred.flatMap((nested) => collectPlanFields(nested)),
      ];
  }
}

function findPlanField(queryPlan: QueryPlan, path: string): PlanField {
  const field = collectPlanFields(queryPlan.root).find(
    (planField) => planField.path.join('.') === path,
  );
  invariant(field !== undefined, `No field at ${path}.`);
  return field;
}

describe('QueryPlanBuilder', () => {
  describe('selection sets', () => {
    it('runs query fields in parallel', () => {
      expect(printPlan('{ hero { id name } version }')).to.equal(dedent`
        Operation: query
          Parallel:
            Composite 'hero' (Query.hero: Character):
              Parallel:
                Resolver 'hero.id' (Character.id: ID!)
                Resolver 'hero.name' (Character.name: String)
            Resolver 'version' (Query.version: String)
      `);
    });

    it('runs mutation root fields serially', () => {
      expect(printPlan('mutation M { first second }')).to.equal(dedent`
        Operation: mutation M
          Serial:
            Resolver 'first' (Mutation.first: String)
            Resolver 'second' (Mutation.second: String)
      `);
    });

    it('groups the parallel fields of a serial selection set', () => {
      expect(printPlan('mutation { first __typename second }')).to.equal(dedent`
        Operation: mutation
          Serial:
            Resolver 'first' (Mutation.first: String)
            Resolver 'second' (Mutation.second: String)
            Parallel:
              Resolver '__typename' (Mutation.__typename: String!)
      `);
    });

    it('merges fields by response key', () => {
      const queryPlan = plan('{ hero { id } hero { name } h: hero { id } }');

      expect(printQueryPlan(queryPlan)).to.equal(dedent`
        Operation: query
          Parallel:
            Composite 'hero' (Query.hero: Character):
              Parallel:
                Resolver 'hero.id' (Character.id: ID!)
                Resolver 'hero.name' (Character.name: String)
            Composite 'h' (Query.hero: Character):
              Parallel:
                Resolver 'h.id' (Character.id: ID!)
      `);
      expect(findPlanField(queryPlan, 'hero').fieldNodes).to.have.lengthOf(2);
    });

    it('resolves fields of fragments on the type they name', () => {
      const queryPlan = plan(dedent`
        {
          node(id: "1") {
            id
            ... on Character { name }
            ... on Node { id }
          }
        }
      `);

      expect(printQueryPlan(queryPlan)).to.equal(dedent`
        Operation: query
          Parallel:
            Composite 'node' (Query.node: Node):
              Parallel:
                Resolver 'node.id' (Node.id: ID!)
                Resolver 'node.name' (Character.name: String)
      `);

      const id = findPlanField(queryPlan, 'node.id');
      expect(id.typeCondition).to.equal(undefined);
      expect(id.fieldNodes).to.have.lengthOf(2);
      expect(findPlanField(queryPlan, 'node.name').typeCondition).to.equal(
        'Character',
      );
      expect(findPlanField(queryPlan, 'node').arguments).to.have.lengthOf(1);
    });

    it('applies literal skip and include', () => {
      expect(
        printPlan(dedent`
          query ($v: Boolean) {
            a: version @skip(if: true)
            b: version @include(if: false)
            c: version @include(if: true)
            d: version @skip(if: $v)
            ... @skip(if: true) { hero { id } }
          }
        `),
      ).to.equal(dedent`
        Operation: query
          Parallel:
            Resolver 'c' (Query.version: String)
            Resolver 'd' (Query.version: String)
      `);
    });

    it('plans an operation with nothing selected', () => {
      const queryPlan = plan('{ ... @include(if: false) { version } }');

      expect(queryPlan.root.node).to.equal(undefined);
      expect(printQueryPlan(queryPlan)).to.equal('Operation: query');
    });

    it('looks up each field once per selection', () => {
      const metadata = createSchemaFieldMetadataProvider(testSchema);
      const resolveField = sinon.spy(metadata, 'resolveField');

      plan('{ hero { id __typename } }', metadata);

      expect(resolveField.args).to.deep.equal([
        ['Query', 'hero'],
        ['Character', 'id'],
      ]);
    });

    it('rejects unknown fields', () => {
      const error = catchError(() =>
        plan(dedent`
          {
            hero {
              nope
            }
          }
        `),
      );

      expect(error).to.be.an.instanceOf(UnknownFieldError);
      expect(error).to.have.property(
        'message',
        'Cannot query field "nope" on type "Character".',
      );
      expect(error).to.have.deep.property('path', ['hero', 'nope']);
      expect(error).to.have.deep.property('locations', [{ line: 3, column: 5 }]);
    });

    it('rejects operations the schema has no root type for', () => {
      const metadata = createSchemaFieldMetadataProvider(
        buildSchema('type Query { a: String }'),
      );
      const error = catchError(() => plan('mutation { a }', metadata));

      expect(error).to.be.an.instanceOf(UnknownTypeError);
      expect(error).to.have.property(
        'message',
        'Schema is not configured to execute mutation operation.',
      );
      expect(error).to.have.property('typeName', 'mutation');
      expect(error).to.have.deep.property('locations', [{ line: 1, column: 1 }]);
    });

    it('lets pure fields skip serial ordering', () => {
      const metadata: FieldMetadataProvider = {
        resolveField(parentType, fieldName) {
          const field = testMetadata.resolveField(parentType, fieldName);
          return field !== undefined && fieldName === 'second'
            ? { ...field, isPure: true }
            : field;
        },
        getRootType: (operationType) => testMetadata.getRootType(operationType),
      };

      expect(
        printQueryPlan(plan('mutation { first second }', metadata)),
      ).to.equal(dedent`
        Operation: mutation
          Serial:
            Resolver 'first' (Mutation.first: String)
            Parallel:
              Resolver 'second' (Mutation.second: String)
      `);
    });
  });

  describe('nullability modifiers', () => {
    it('changes the result type', () => {
      expect(printPlan('{ version! heroes[?]? { id } }')).to.equal(dedent`
        Operation: query
          Parallel:
            Resolver 'version' (Query.version: String!)
            Composite 'heroes' (Query.heroes: [Character]):
              Parallel:
                Resolver 'heroes.id' (Character.id: ID!)
      `);
    });

    it('rejects modifiers deeper than the type', () => {
      const error = catchError(() => plan('{ numbers[[!]] }'));

      expect(error).to.be.an.instanceOf(NullabilityModifierError);
      expect(error).to.have.property(
        'message',
        'Nullability modifier "[[!]]" does not match the list depth of type "[Int]" of field "Query.numbers".',
      );
      expect(error).to.have.deep.property('path', ['numbers']);
      expect(error).to.have.deep.property('locations', [
        { line: 1, column: 10 },
      ]);
      expect(error).to.have.property('code', 'INVALID_NULLABILITY_MODIFIER');

      expect(() => plan('{ version[] }')).to.throw(
        NullabilityModifierError,
        'Nullability modifier "[]" does not match the list depth of type "String" of field "Query.version".',
      );
    });
  });

  describe('@defer', () => {
    it('defers fragments at the root', () => {
      const queryPlan = plan('{ version ... @defer { hero { id } } }');

      expect(printQueryPlan(queryPlan)).to.equal(dedent`
        Operation: query
          Parallel:
            Resolver 'version' (Query.version: String)
        Defer at root on Query:
          Parallel:
            Composite 'hero' (Query.hero: Character):
              Parallel:
                Resolver 'hero.id' (Character.id: ID!)
      `);
      expect(queryPlan.deferred[0]).to.include({
        kind: 'Defer',
        parentType: 'Query',
        label: undefined,
        if: undefined,
      });
      expect(queryPlan.deferred[0].path).to.deep.equal([]);
    });

    it('nests deferred fragments with labels and conditions', () => {
      const queryPlan = plan(dedent`
        query ($d: Boolean) {
          hero {
            id
            ... @defer(label: "outer") {
              name
              friends {
                ... on Character @defer(label: "inner", if: $d) { id }
              }
            }
          }
        }
      `);

      expect(printQueryPlan(queryPlan)).to.equal(dedent`
        Operation: query
          Parallel:
            Composite 'hero' (Query.hero: Character):
              Parallel:
                Resolver 'hero.id' (Character.id: ID!)
        Defer at 'hero' on Character (label: "outer"):
          Parallel:
            Resolver 'hero.name' (Character.name: String)
            Composite 'hero.friends' (Character.friends: [Character])
          Defer at 'hero.friends' on Character (label: "inner", if: $d):
            Parallel:
              Resolver 'hero.friends.id' (Character.id: ID!)
      `);

      const [outer] = queryPlan.deferred;
      expect(outer.deferred).to.have.lengthOf(1);
      expect(outer.deferred[0].if).to.deep.equal({ variable: 'd' });
      expect(outer.deferred[0].path).to.deep.equal(['hero', 'friends']);
    });

    it('defers fragments on a narrower type', () => {
      expect(
        printPlan('{ node(id: "1") { ... on Character @defer { name } } }'),
      ).to.equal(dedent`
        Operation: query
          Parallel:
            Composite 'node' (Query.node: Node)
        Defer at 'node' on Character:
          Parallel:
            Resolver 'node.name' (Character.name: String)
      `);
    });

    it('inlines fragments whose @defer is disabled', () => {
      const queryPlan = plan('{ hero { ... @defer(if: false) { id } } }');

      expect(queryPlan.deferred).to.deep.equal([]);
      expect(printQueryPlan(queryPlan)).to.equal(dedent`
        Operation: query
          Parallel:
            Composite 'hero' (Query.hero: Character):
              Parallel:
                Resolver 'hero.id' (Character.id: ID!)
      `);
    });

    it('inlines fragments below fields that cannot defer', () => {
      const metadata: FieldMetadataProvider = {
        resolveField(parentType, fieldName) {
          const fieldMetadata = testMetadata.resolveField(parentType, fieldName);
          return fieldMetadata !== undefined && fieldName === 'hero'
            ? { ...fieldMetadata, isDeferrable: false }
            : fieldMetadata;
        },
        getRootType: (operationType) => testMetadata.getRootType(operationType),
      };
      const { logger, records } = captureLogs();

      const queryPlan = plan(
        '{ hero { ... @defer { id } } }',
        metadata,
        logger,
      );

      expect(queryPlan.deferred).to.deep.equal([]);
      expect(findPlanField(queryPlan, 'hero.id').parentType).to.equal(
        'Character',
      );
      expect(
        records.find(
          (record) =>
            record.msg ===
            '@defer below a non-deferrable field, fragment inlined',
        ),
      ).to.deep.include({ level: 10, path: ['hero'], parentType: 'Character' });
    });
  });

  describe('@stream', () => {
    it('streams list fields', () => {
      const queryPlan = plan('{ numbers @stream(initialCount: 2, label: "nums") }');

      expect(printQueryPlan(queryPlan)).to.equal(dedent`
        Operation: query
          Parallel:
            Stream #0 'numbers' (initialCount: 2, label: "nums"):
              Resolver 'numbers' (Query.numbers: [Int])
      `);

      const root = queryPlan.root.node;
      invariant(root?.kind === 'Parallel');
      expect(queryPlan.streams.get(0)).to.equal(root.nodes[0]);
    });

    it('keeps variable arguments as references', () => {
      expect(
        printPlan(
          'query ($n: Int, $s: Boolean) { numbers @stream(initialCount: $n, if: $s) }',
        ),
      ).to.equal(dedent`
        Operation: query
          Parallel:
            Stream #0 'numbers' (initialCount: $n, if: $s):
              Resolver 'numbers' (Query.numbers: [Int])
      `);
    });

    it('defaults and clamps the initial count', () => {
      const defaulted = plan('{ numbers @stream }').streams.get(0);
      expect(defaulted?.initialCount).to.equal(0);

      const clamped = plan('{ numbers @stream(initialCount: -3) }').streams.get(0);
      expect(clamped?.initialCount).to.equal(0);

      const huge = plan(
        '{ numbers @stream(initialCount: 99999999999999999999) }',
      ).streams.get(0);
      expect(huge?.initialCount).to.equal(Number.MAX_SAFE_INTEGER);
    });

    it('numbers streams in selection order', () => {
      const queryPlan = plan(dedent`
        {
          heroes @stream { friends @stream { id } }
          numbers @stream
          ... @defer { matrix @stream }
        }
      `);

      expect([...queryPlan.streams.keys()]).to.deep.equal([0, 1, 2, 3]);
      expect(
        [...queryPlan.streams.values()].map((stream) => stream.path.join('.')),
      ).to.deep.equal(['heroes', 'heroes.friends', 'numbers', 'matrix']);
    });

    it('ignores @stream on fields that are not lists', () => {
      const { logger, records } = captureLogs();
      const queryPlan = plan('{ version @stream }', testMetadata, logger);

      expect(queryPlan.streams.size).to.equal(0);
      expect(printQueryPlan(queryPlan)).to.equal(dedent`
        Operation: query
          Parallel:
            Resolver 'version' (Query.version: String)
      `);
      expect(
        records.find(
          (record) =>
            record.msg ===
            '@stream ignored on a field that is not a streamable list',
        ),
      ).to.deep.include({
        level: 20,
        path: ['version'],
        field: 'Query.version',
      });
    });

    it('ignores disabled streams', () => {
      expect(plan('{ numbers @stream(if: false) }').streams.size).to.equal(0);
    });
  });

  describe('subscriptions', () => {
    it('plans the single root field', () => {
      expect(printPlan('subscription OnHero { heroChanged { id } }')).to.equal(
        dedent`
          Operation: subscription OnHero
            Subscription 'heroChanged' (Subscription.heroChanged: Character):
              Parallel:
                Resolver 'heroChanged.id' (Character.id: ID!)
        `,
      );
      expect(printPlan('subscription { count }')).to.equal(dedent`
        Operation: subscription
          Subscription 'count' (Subscription.count: Int)
      `);
    });

    it('merges repeated selections of the root field', () => {
      expect(
        printPlan('subscription { ... on Subscription { count } count }'),
      ).to.equal(dedent`
        Operation: subscription
          Subscription 'count' (Subscription.count: Int)
      `);
    });

    it('requires exactly one root field', () => {
      const error = catchError(() =>
        plan('subscription { count heroChanged { id } }'),
      );

      expect(error).to.be.an.instanceOf(InvalidSubscriptionSelectionError);
      expect(error).to.have.property(
        'message',
        'Anonymous Subscription must select only one top level field.',
      );
      expect(error).to.have.deep.property('locations', [
        { line: 1, column: 14 },
      ]);
    });

    it('rejects deferring the root field', () => {
      const error = catchError(() =>
        plan('subscription S { ... @defer { count } }'),
      );

      expect(error).to.be.an.instanceOf(InvalidSubscriptionSelectionError);
      expect(error).to.have.property(
        'message',
        'Subscription "S" must not defer its top level field.',
      );
      expect(error).to.have.deep.property('locations', [
        { line: 1, column: 29 },
      ]);
    });

    it('rejects streaming the root field', () => {
      const error = catchError(() => plan('subscription { counts @stream }'));

      expect(error).to.be.an.instanceOf(InvalidSubscriptionSelectionError);
      expect(error).to.have.property(
        'message',
        'Anonymous Subscription must not stream its top level field.',
      );
      expect(error).to.have.deep.property('path', ['counts']);
      expect(error).to.have.deep.property('locations', [
        { line: 1, column: 16 },
      ]);
    });
  });

  describe('caching', () => {
    it('builds the same plan for the same operation', () => {
      const operation = resolveOperation(parse('{ hero { id } }'));

      expect(printQueryPlan(buildQueryPlan(operation, testMetadata))).to.equal(
        printQueryPlan(buildQueryPlan(operation, testMetadata)),
      );
      expect(buildQueryPlan(operation, testMetadata)).to.not.equal(
        buildQueryPlan(operation, testMetadata),
      );
    });

    it('memoizes plans per operation and metadata', () => {
      const operation = resolveOperation(parse('{ hero { id } }'));
      const otherMetadata = createSchemaFieldMetadataProvider(testSchema);

      const queryPlan = createQueryPlan(operation, testMetadata);
      expect(createQueryPlan(operation, testMetadata)).to.equal(queryPlan);
      expect(createQueryPlan(operation, otherMetadata)).to.not.equal(queryPlan);
    });
  });
});
