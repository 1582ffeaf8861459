import { invariant } from 'graphql/jsutils/invariant.js';

import type { SelectionSetNode } from '../language/ast.js';
import type { PreparedOperation } from '../operation/PreparedOperation.js';

import type {
  PlanField,
  ResponsePath,
  StreamPlanNode,
  VariableReference,
} from './QueryPlanNode.js';

/**
 * A fragment set aside by `@defer`, planned once the tree it was found in is
 * complete.
 */
export interface DeferredFragment {
  readonly selectionSet: SelectionSetNode;
  readonly parentType: string;
  readonly path: ResponsePath;
  readonly label: string | undefined;
  readonly if: VariableReference | undefined;
}

/**
 * Mutable state of one plan tree under construction. Each entry of
 * `nodePath` carries the field nodes it was planned from, so the selection
 * walk moves with it. Deferred fragments are planned in a branch, which
 * shares only the prepared operation.
 */
export class QueryPlanContext {
  readonly operation: PreparedOperation;
  readonly basePath: ResponsePath;
  readonly nodePath: Array<PlanField>;
  readonly deferred: Array<DeferredFragment>;
  readonly streams: Map<number, StreamPlanNode>;

  constructor(operation: PreparedOperation, basePath: ResponsePath = []) {
    this.operation = operation;
    this.basePath = basePath;
    this.nodePath = [];
    this.deferred = [];
    this.streams = new Map();
  }

  push(field: PlanField): void {
    this.nodePath.push(field);
  }

  pop(): void {
    invariant(this.nodePath.length > 0, 'Cannot pop the root of a plan.');
    this.nodePath.pop();
  }

  /**
   * The planned field whose selection set is being walked, undefined at the
   * root of the tree.
   */
  currentField(): PlanField | undefined {
    return this.nodePath[this.nodePath.length - 1];
  }

  /**
   * Deferring is allowed at the root and below fields that allow it.
   */
  isDeferrable(): boolean {
    return this.currentField()?.metadata.isDeferrable ?? true;
  }

  responsePath(): Array<string> {
    return [
      ...this.basePath,
      ...this.nodePath.map((field) => field.responseKey),
    ];
  }

  branch(basePath: ResponsePath): QueryPlanContext {
    return new QueryPlanContext(this.operation, basePath);
  }
}
