import type {
  DocumentNode,
  FragmentDefinitionNode,
  OperationDefinitionNode,
  SelectionSetNode,
  VariableDefinitionNode,
} from '../language/ast.js';
import type { OperationTypeNode } from '../language/kinds.js';

/**
 * One operation of a document with every fragment spread replaced by an
 * inline fragment.
 */
export interface PreparedOperation {
  readonly document: DocumentNode;
  readonly operation: OperationDefinitionNode;
  readonly operationType: OperationTypeNode;
  readonly name: string | undefined;
  readonly variableDefinitions: ReadonlyArray<VariableDefinitionNode>;
  /** Fragments reachable from the operation, in first-spread order. */
  readonly fragments: ReadonlyMap<string, FragmentDefinitionNode>;
  /** Contains no fragment spreads. */
  readonly selectionSet: SelectionSetNode;
}
