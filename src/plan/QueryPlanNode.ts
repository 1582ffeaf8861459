import type {
  ArgumentNode,
  DirectiveNode,
  FieldNode,
  TypeNode,
} from '../language/ast.js';
import type { OperationTypeNode } from '../language/kinds.js';

import type { FieldMetadata } from './FieldMetadata.js';

/**
 * A directive argument left to be read from the variables at execution time.
 */
export interface VariableReference {
  readonly variable: string;
}

export type ResponsePath = ReadonlyArray<string>;

/**
 * A field to resolve, together with every field node that selects it under
 * the same response key.
 */
export interface PlanField {
  readonly responseKey: string;
  readonly fieldName: string;
  /** The type the field is resolved on. */
  readonly parentType: string;
  /** Set when the field was selected through a fragment on another type. */
  readonly typeCondition: string | undefined;
  readonly path: ResponsePath;
  readonly fieldNodes: ReadonlyArray<FieldNode>;
  readonly arguments: ReadonlyArray<ArgumentNode>;
  readonly directives: ReadonlyArray<DirectiveNode>;
  /** The declared type with any nullability modifier applied. */
  readonly resultType: TypeNode;
  readonly metadata: FieldMetadata;
}

export interface ResolverPlanNode {
  readonly kind: 'Resolver';
  readonly field: PlanField;
}

export interface CompositePlanNode {
  readonly kind: 'Composite';
  readonly field: PlanField;
  /** Undefined when every selection below the field is deferred. */
  readonly node: SelectionPlanNode | undefined;
}

export interface StreamPlanNode {
  readonly kind: 'Stream';
  readonly id: number;
  readonly label: string | undefined;
  readonly path: ResponsePath;
  readonly initialCount: number | VariableReference;
  readonly if: VariableReference | undefined;
  readonly node: ResolverPlanNode | CompositePlanNode;
}

export type FieldPlanNode = ResolverPlanNode | CompositePlanNode | StreamPlanNode;

export interface ParallelPlanNode {
  readonly kind: 'Parallel';
  readonly nodes: ReadonlyArray<FieldPlanNode>;
}

/**
 * Runs its nodes one after the other. A trailing Parallel node holds the
 * fields of the same selection set that need no ordering.
 */
export interface SerialPlanNode {
  readonly kind: 'Serial';
  readonly nodes: ReadonlyArray<FieldPlanNode | ParallelPlanNode>;
}

export type SelectionPlanNode = SerialPlanNode | ParallelPlanNode;

export interface SubscriptionPlanNode {
  readonly kind: 'Subscription';
  readonly field: PlanField;
  /** Plan for each event; undefined for a leaf field. */
  readonly node: SelectionPlanNode | undefined;
}

export interface DeferPlanNode {
  readonly kind: 'Defer';
  readonly label: string | undefined;
  /** Response path of the object the fragment was selected on. */
  readonly path: ResponsePath;
  readonly parentType: string;
  readonly if: VariableReference | undefined;
  readonly node: SelectionPlanNode | undefined;
  /** Fragments deferred within this one. */
  readonly deferred: ReadonlyArray<DeferPlanNode>;
}

export interface OperationPlanNode {
  readonly kind: 'Operation';
  readonly operationType: OperationTypeNode;
  readonly name: string | undefined;
  readonly node: SelectionPlanNode | SubscriptionPlanNode | undefined;
}

export type QueryPlanNode =
  | OperationPlanNode
  | SerialPlanNode
  | ParallelPlanNode
  | ResolverPlanNode
  | CompositePlanNode
  | SubscriptionPlanNode
  | DeferPlanNode
  | StreamPlanNode;

export interface QueryPlan {
  readonly root: OperationPlanNode;
  /** Every stream node of the plan, deferred ones included, by id. */
  readonly streams: ReadonlyMap<number, StreamPlanNode>;
  readonly deferred: ReadonlyArray<DeferPlanNode>;
}
