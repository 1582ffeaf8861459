import { invariant } from 'graphql/jsutils/invariant.js';

import {
  InvalidSubscriptionSelectionError,
  locatedAt,
  NullabilityModifierError,
  UnknownFieldError,
  UnknownTypeError,
} from '../error/errors.js';
import type {
  DirectiveNode,
  FieldNode,
  InlineFragmentNode,
  SelectionSetNode,
  ValueNode,
} from '../language/ast.js';
import { Kind, OperationTypeNode } from '../language/kinds.js';
import { print } from '../language/printer.js';
import type { Logger } from '../logger.js';
import { defaultLogger } from '../logger.js';
import type { PreparedOperation } from '../operation/PreparedOperation.js';
import { memoize2 } from '../utilities/memoize2.js';

import type { FieldMetadataProvider } from './FieldMetadata.js';
import { TYPENAME_FIELD_METADATA } from './FieldMetadata.js';
import { QueryPlanContext } from './QueryPlanContext.js';
import type {
  CompositePlanNode,
  DeferPlanNode,
  FieldPlanNode,
  OperationPlanNode,
  PlanField,
  QueryPlan,
  ResolverPlanNode,
  SelectionPlanNode,
  StreamPlanNode,
  SubscriptionPlanNode,
  VariableReference,
} from './QueryPlanNode.js';
import {
  applyNullabilityAssertion,
  getNamedTypeName,
  isListTypeNode,
} from './typeNodes.js';

export interface BuildQueryPlanOptions {
  logger?: Logger | undefined;
}

/**
 * Fields selected under one response key on one type.
 */
interface CollectedField {
  responseKey: string;
  fieldName: string;
  parentType: string;
  typeCondition: string | undefined;
  fieldNodes: Array<FieldNode>;
}

interface StreamOptions {
  label: string | undefined;
  initialCount: number | VariableReference;
  if: VariableReference | undefined;
}

/**
 * Compiles a prepared operation into a query plan.
 */
export function buildQueryPlan(
  operation: PreparedOperation,
  metadata: FieldMetadataProvider,
  options?: BuildQueryPlanOptions,
): QueryPlan {
  return new QueryPlanBuilder(
    operation,
    metadata,
    options?.logger ?? defaultLogger,
  ).build();
}

/**
 * Cached variant of `buildQueryPlan`, keyed on the operation and the
 * metadata provider.
 */
export const createQueryPlan = memoize2(
  (operation: PreparedOperation, metadata: FieldMetadataProvider) =>
    buildQueryPlan(operation, metadata),
);

/**
 * @internal
 */
export class QueryPlanBuilder {
  operation: PreparedOperation;
  metadata: FieldMetadataProvider;
  logger: Logger;
  _nextStreamId: number;

  constructor(
    operation: PreparedOperation,
    metadata: FieldMetadataProvider,
    logger: Logger,
  ) {
    this.operation = operation;
    this.metadata = metadata;
    this.logger = logger;
    this._nextStreamId = 0;
  }

  build(): QueryPlan {
    const { operationType, name, selectionSet } = this.operation;

    const rootType = this.metadata.getRootType(operationType);
    if (rootType === undefined) {
      throw new UnknownTypeError(
        operationType,
        `Schema is not configured to execute ${operationType} operation.`,
        locatedAt(this.operation.operation),
      );
    }

    const context = new QueryPlanContext(this.operation);
    const node =
      operationType === OperationTypeNode.SUBSCRIPTION
        ? this._buildSubscription(context, rootType)
        : this._buildSelectionSet(context, rootType, [selectionSet]);

    const root: OperationPlanNode = {
      kind: 'Operation',
      operationType,
      name,
      node,
    };

    const deferred = this._buildDeferred(context);
    const streams = new Map(
      [...context.streams].sort(([idA], [idB]) => idA - idB),
    );

    this.logger.debug(
      {
        operationName: name,
        operationType,
        deferred: countDeferred(deferred),
        streams: streams.size,
      },
      'query plan built',
    );

    return { root, streams, deferred };
  }

  _buildSubscription(
    context: QueryPlanContext,
    rootType: string,
  ): SubscriptionPlanNode {
    const subscriptionName =
      this.operation.name === undefined
        ? 'Anonymous Subscription'
        : `Subscription "${this.operation.name}"`;

    const fields = new Map<string, CollectedField>();
    this._collectFields(
      context,
      rootType,
      this.operation.selectionSet,
      undefined,
      fields,
    );

    if (context.deferred.length > 0) {
      throw new InvalidSubscriptionSelectionError(
        `${subscriptionName} must not defer its top level field.`,
        locatedAt(context.deferred[0].selectionSet),
      );
    }

    if (fields.size !== 1) {
      throw new InvalidSubscriptionSelectionError(
        `${subscriptionName} must select only one top level field.`,
        locatedAt(this.operation.selectionSet),
      );
    }

    const [collected] = fields.values();
    const node = this._buildField(context, collected);
    if (node.kind === 'Stream') {
      throw new InvalidSubscriptionSelectionError(
        `${subscriptionName} must not stream its top level field.`,
        { ...locatedAt(node.node.field.fieldNodes[0]), path: node.path },
      );
    }

    return {
      kind: 'Subscription',
      field: node.field,
      node: node.kind === 'Composite' ? node.node : undefined,
    };
  }

  _buildSelectionSet(
    context: QueryPlanContext,
    parentType: string,
    selectionSets: ReadonlyArray<SelectionSetNode>,
  ): SelectionPlanNode | undefined {
    const fields = new Map<string, CollectedField>();
    for (const selectionSet of selectionSets) {
      this._collectFields(context, parentType, selectionSet, undefined, fields);
    }

    const nodes: Array<FieldPlanNode> = [];
    for (const collected of fields.values()) {
      nodes.push(this._buildField(context, collected));
    }

    return partitionFieldNodes(nodes);
  }

  /**
   * Groups the fields of a selection set by type condition and response key.
   * Inline fragments are flattened, except deferred ones, which are recorded
   * on the context instead.
   */
  _collectFields(
    context: QueryPlanContext,
    parentType: string,
    selectionSet: SelectionSetNode,
    typeCondition: string | undefined,
    fields: Map<string, CollectedField>,
  ): void {
    for (const selection of selectionSet.selections) {
      switch (selection.kind) {
        case Kind.FIELD: {
          if (isExcluded(selection.directives)) {
            continue;
          }
          const responseKey = selection.alias?.value ?? selection.name.value;
          const key = `${typeCondition ?? ''}:${responseKey}`;
          const collected = fields.get(key);
          if (collected === undefined) {
            fields.set(key, {
              responseKey,
              fieldName: selection.name.value,
              parentType: typeCondition ?? parentType,
              typeCondition,
              fieldNodes: [selection],
            });
          } else {
            collected.fieldNodes.push(selection);
          }
          break;
        }
        case Kind.INLINE_FRAGMENT: {
          if (isExcluded(selection.directives)) {
            continue;
          }
          const conditionType = selection.typeCondition?.name.value;
          const fragmentTypeCondition =
            conditionType === undefined ||
            conditionType === (typeCondition ?? parentType)
              ? typeCondition
              : conditionType;

          if (
            this._deferFragment(
              context,
              selection,
              fragmentTypeCondition ?? parentType,
            )
          ) {
            continue;
          }

          this._collectFields(
            context,
            parentType,
            selection.selectionSet,
            fragmentTypeCondition,
            fields,
          );
          break;
        }
        case Kind.FRAGMENT_SPREAD:
          invariant(
            false,
            `Fragment "${selection.name.value}" was not inlined into the operation.`,
          );
      }
    }
  }

  /**
   * Records the fragment on the context when `@defer` applies to it.
   */
  _deferFragment(
    context: QueryPlanContext,
    fragment: InlineFragmentNode,
    parentType: string,
  ): boolean {
    const directive = findDirective(fragment.directives, 'defer');
    if (directive === undefined) {
      return false;
    }

    const path = context.responsePath();
    const condition = getArgument(directive, 'if');
    if (condition?.kind === Kind.BOOLEAN && !condition.value) {
      this.logger.trace({ path }, '@defer disabled, fragment inlined');
      return false;
    }

    if (!context.isDeferrable()) {
      this.logger.trace(
        { path, parentType },
        '@defer below a non-deferrable field, fragment inlined',
      );
      return false;
    }

    const label = getArgument(directive, 'label');
    context.deferred.push({
      selectionSet: fragment.selectionSet,
      parentType,
      path,
      label: label?.kind === Kind.STRING ? label.value : undefined,
      if: toVariableReference(condition),
    });
    this.logger.trace({ path, parentType }, 'fragment deferred');
    return true;
  }

  _buildField(
    context: QueryPlanContext,
    collected: CollectedField,
  ): FieldPlanNode {
    const { responseKey, fieldName, parentType, fieldNodes } = collected;
    const path = [...context.responsePath(), responseKey];
    const fieldNode = fieldNodes[0];

    const metadata =
      fieldName === '__typename'
        ? TYPENAME_FIELD_METADATA
        : this.metadata.resolveField(parentType, fieldName);
    if (metadata === undefined) {
      throw new UnknownFieldError(parentType, fieldName, {
        ...locatedAt(fieldNode),
        path,
      });
    }

    const assertion = fieldNode.nullabilityAssertion;
    const resultType = applyNullabilityAssertion(metadata.resultType, assertion);
    if (resultType === undefined) {
      invariant(assertion !== undefined);
      throw new NullabilityModifierError(
        `Nullability modifier "${print(
          assertion,
        )}" does not match the list depth of type "${print(
          metadata.resultType,
        )}" of field "${parentType}.${fieldName}".`,
        { ...locatedAt(assertion), path },
      );
    }

    const field: PlanField = {
      responseKey,
      fieldName,
      parentType,
      typeCondition: collected.typeCondition,
      path,
      fieldNodes,
      arguments: fieldNode.arguments,
      directives: fieldNodes.flatMap((node) => node.directives),
      resultType,
      metadata,
    };

    const streamOptions = this._getStreamOptions(field);
    if (streamOptions === undefined) {
      return this._buildFieldNode(context, field);
    }

    // Ids are taken before descending so they follow encounter order.
    const id = this._nextStreamId++;
    const streamNode: StreamPlanNode = {
      kind: 'Stream',
      id,
      path,
      ...streamOptions,
      node: this._buildFieldNode(context, field),
    };
    context.streams.set(id, streamNode);
    this.logger.trace({ path, id }, 'field streamed');
    return streamNode;
  }

  _buildFieldNode(
    context: QueryPlanContext,
    field: PlanField,
  ): ResolverPlanNode | CompositePlanNode {
    const selectionSets: Array<SelectionSetNode> = [];
    for (const node of field.fieldNodes) {
      if (node.selectionSet !== undefined) {
        selectionSets.push(node.selectionSet);
      }
    }

    if (selectionSets.length === 0) {
      return { kind: 'Resolver', field };
    }

    context.push(field);
    const node = this._buildSelectionSet(
      context,
      getNamedTypeName(field.resultType),
      selectionSets,
    );
    context.pop();

    return { kind: 'Composite', field, node };
  }

  _getStreamOptions(field: PlanField): StreamOptions | undefined {
    const directive = findDirective(field.directives, 'stream');
    if (directive === undefined) {
      return undefined;
    }

    const condition = getArgument(directive, 'if');
    if (condition?.kind === Kind.BOOLEAN && !condition.value) {
      this.logger.trace({ path: field.path }, '@stream disabled');
      return undefined;
    }

    if (!field.metadata.isStreamable || !isListTypeNode(field.resultType)) {
      this.logger.debug(
        {
          path: field.path,
          field: `${field.parentType}.${field.fieldName}`,
        },
        '@stream ignored on a field that is not a streamable list',
      );
      return undefined;
    }

    const label = getArgument(directive, 'label');
    const initialCount = getArgument(directive, 'initialCount');

    return {
      label: label?.kind === Kind.STRING ? label.value : undefined,
      initialCount:
        initialCount?.kind === Kind.VARIABLE
          ? { variable: initialCount.name.value }
          : initialCount?.kind === Kind.INT
          ? clampInitialCount(parseInt(initialCount.value, 10))
          : 0,
      if: toVariableReference(condition),
    };
  }

  /**
   * Plans every fragment deferred within the context, each in its own
   * branch, and folds the branch streams into the context's index.
   */
  _buildDeferred(context: QueryPlanContext): Array<DeferPlanNode> {
    return context.deferred.map((fragment) => {
      const branch = context.branch(fragment.path);
      const node = this._buildSelectionSet(branch, fragment.parentType, [
        fragment.selectionSet,
      ]);
      const deferred = this._buildDeferred(branch);

      for (const [id, stream] of branch.streams) {
        context.streams.set(id, stream);
      }

      return {
        kind: 'Defer',
        label: fragment.label,
        path: fragment.path,
        parentType: fragment.parentType,
        if: fragment.if,
        node,
        deferred,
      };
    });
  }
}

/**
 * Serial fields keep their order ahead of a single Parallel group holding the
 * rest. Pure fields join the Parallel group whatever their serial flag. No
 * empty group is ever produced.
 */
function partitionFieldNodes(
  nodes: ReadonlyArray<FieldPlanNode>,
): SelectionPlanNode | undefined {
  if (nodes.length === 0) {
    return undefined;
  }

  const serial: Array<FieldPlanNode> = [];
  const parallel: Array<FieldPlanNode> = [];
  for (const node of nodes) {
    const { requiresSerialExecution, isPure } = getPlanField(node).metadata;
    if (requiresSerialExecution && !isPure) {
      serial.push(node);
    } else {
      parallel.push(node);
    }
  }

  if (serial.length === 0) {
    return { kind: 'Parallel', nodes: parallel };
  }

  if (parallel.length === 0) {
    return { kind: 'Serial', nodes: serial };
  }

  return {
    kind: 'Serial',
    nodes: [...serial, { kind: 'Parallel', nodes: parallel }],
  };
}

function clampInitialCount(count: number): number {
  return Math.min(Math.max(0, count), Number.MAX_SAFE_INTEGER);
}

function getPlanField(node: FieldPlanNode): PlanField {
  return node.kind === 'Stream' ? node.node.field : node.field;
}

function countDeferred(deferred: ReadonlyArray<DeferPlanNode>): number {
  return deferred.reduce(
    (count, node) => count + 1 + countDeferred(node.deferred),
    0,
  );
}

function findDirective(
  directives: ReadonlyArray<DirectiveNode>,
  name: string,
): DirectiveNode | undefined {
  return directives.find((directive) => directive.name.value === name);
}

function getArgument(
  directive: DirectiveNode,
  name: string,
): ValueNode | undefined {
  return directive.arguments.find((argument) => argument.name.value === name)
    ?.value;
}

function toVariableReference(
  value: ValueNode | undefined,
): VariableReference | undefined {
  return value?.kind === Kind.VARIABLE
    ? { variable: value.name.value }
    : undefined;
}

/**
 * Only literal conditions are applied here; `@skip` and `@include` on
 * variables stay on the field nodes for the executor.
 */
function isExcluded(directives: ReadonlyArray<DirectiveNode>): boolean {
  for (const directive of directives) {
    const condition = getArgument(directive, 'if');
    if (condition?.kind !== Kind.BOOLEAN) {
      continue;
    }
    if (directive.name.value === 'skip' && condition.value) {
      return true;
    }
    if (directive.name.value === 'include' && !condition.value) {
      return true;
    }
  }
  return false;
}
