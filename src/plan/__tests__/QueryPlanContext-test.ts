import { expect } from 'chai';
import { invariant } from 'graphql/jsutils/invariant.js';
import { describe, it } from 'mocha';

import type { FieldNode } from '../../language/ast.js';
import { Kind } from '../../language/kinds.js';
import { parse, parseType } from '../../language/parser.js';
import { resolveOperation } from '../../operation/resolveOperation.js';

import { TYPENAME_FIELD_METADATA } from '../FieldMetadata.js';
import { QueryPlanContext } from '../QueryPlanContext.js';
import type { PlanField } from '../QueryPlanNode.js';

const operation = resolveOperation(parse('{ hero { id } }'));

function heroField(isDeferrable: boolean): {
  field: PlanField;
  fieldNode: FieldNode;
} {
  const fieldNode = operation.selectionSet.selections[0];
  invariant(fieldNode.kind === Kind.FIELD);
  return {
    fieldNode,
    field: {
      responseKey: 'hero',
      fieldName: 'hero',
      parentType: 'Query',
      typeCondition: undefined,
      path: ['hero'],
      fieldNodes: [fieldNode],
      arguments: [],
      directives: [],
      resultType: parseType('Character'),
      metadata: {
        ...TYPENAME_FIELD_METADATA,
        resultType: parseType('Character'),
        isDeferrable,
      },
    },
  };
}

describe('QueryPlanContext', () => {
  it('starts at the root', () => {
    const context = new QueryPlanContext(operation);

    expect(context.currentField()).to.equal(undefined);
    expect(context.responsePath()).to.deep.equal([]);
    expect(context.isDeferrable()).to.equal(true);
    expect(() => context.pop()).to.throw('Cannot pop the root of a plan.');
  });

  it('tracks the fields being planned', () => {
    const context = new QueryPlanContext(operation, ['parent']);
    const { field, fieldNode } = heroField(false);

    context.push(field);
    expect(context.currentField()).to.equal(field);
    expect(context.currentField()?.fieldNodes).to.deep.equal([fieldNode]);
    expect(context.responsePath()).to.deep.equal(['parent', 'hero']);
    expect(context.isDeferrable()).to.equal(false);

    context.pop();
    expect(context.responsePath()).to.deep.equal(['parent']);
    expect(context.isDeferrable()).to.equal(true);
  });

  it('branches with fresh state', () => {
    const context = new QueryPlanContext(operation);
    const { field } = heroField(true);
    context.push(field);
    context.deferred.push({
      selectionSet: operation.selectionSet,
      parentType: 'Query',
      path: [],
      label: undefined,
      if: undefined,
    });

    const branch = context.branch(['hero']);
    expect(branch.operation).to.equal(operation);
    expect(branch.basePath).to.deep.equal(['hero']);
    expect(branch.nodePath).to.deep.equal([]);
    expect(branch.deferred).to.deep.equal([]);
    expect(branch.streams.size).to.equal(0);
  });
});
