import {
  CyclicFragmentError,
  DuplicateFragmentError,
  FragmentNotFoundError,
  locatedAt,
  OperationNotFoundError,
} from '../error/errors.js';
import type {
  DocumentNode,
  FragmentDefinitionNode,
  FragmentSpreadNode,
  InlineFragmentNode,
  OperationDefinitionNode,
  SelectionNode,
  SelectionSetNode,
} from '../language/ast.js';
import { Kind } from '../language/kinds.js';

import type { PreparedOperation } from './PreparedOperation.js';

/**
 * Selects the operation to run from a document and inlines every fragment it
 * spreads, directly or transitively.
 */
export function resolveOperation(
  document: DocumentNode,
  operationName?: string,
): PreparedOperation {
  let operation: OperationDefinitionNode | undefined;
  const fragmentDefinitions = new Map<string, FragmentDefinitionNode>();
  for (const definition of document.definitions) {
    switch (definition.kind) {
      case Kind.OPERATION_DEFINITION:
        if (operationName === undefined) {
          if (operation !== undefined) {
            throw new OperationNotFoundError(
              'Must provide operation name if query contains multiple operations.',
            );
          }
          operation = definition;
        } else if (definition.name?.value === operationName) {
          operation = definition;
        }
        break;
      case Kind.FRAGMENT_DEFINITION: {
        const fragmentName = definition.name.value;
        if (fragmentDefinitions.has(fragmentName)) {
          throw new DuplicateFragmentError(fragmentName, locatedAt(definition));
        }
        fragmentDefinitions.set(fragmentName, definition);
        break;
      }
    }
  }

  if (operation === undefined) {
    if (operationName !== undefined) {
      throw new OperationNotFoundError(
        `Unknown operation named "${operationName}".`,
        operationName,
      );
    }
    throw new OperationNotFoundError('Must provide an operation.');
  }

  const inliner = new FragmentInliner(fragmentDefinitions);
  const selectionSet = inliner.inlineSelectionSet(operation.selectionSet);

  return {
    document,
    operation,
    operationType: operation.operation,
    name: operation.name?.value,
    variableDefinitions: operation.variableDefinitions,
    fragments: inliner.usedFragments,
    selectionSet,
  };
}

/**
 * @internal
 */
class FragmentInliner {
  readonly usedFragments: Map<string, FragmentDefinitionNode>;

  _fragmentDefinitions: ReadonlyMap<string, FragmentDefinitionNode>;
  _inlinedFragments: Map<string, SelectionSetNode>;
  _path: Array<string>;

  constructor(fragmentDefinitions: ReadonlyMap<string, FragmentDefinitionNode>) {
    this.usedFragments = new Map();
    this._fragmentDefinitions = fragmentDefinitions;
    this._inlinedFragments = new Map();
    this._path = [];
  }

  /**
   * Returns the given selection set itself when it contains no spreads.
   */
  inlineSelectionSet(selectionSet: SelectionSetNode): SelectionSetNode {
    let changed = false;
    const selections = selectionSet.selections.map((selection) => {
      const inlined = this._inlineSelection(selection);
      if (inlined !== selection) {
        changed = true;
      }
      return inlined;
    });

    return changed ? { ...selectionSet, selections } : selectionSet;
  }

  _inlineSelection(selection: SelectionNode): SelectionNode {
    switch (selection.kind) {
      case Kind.FIELD: {
        if (selection.selectionSet === undefined) {
          return selection;
        }
        const selectionSet = this.inlineSelectionSet(selection.selectionSet);
        return selectionSet === selection.selectionSet
          ? selection
          : { ...selection, selectionSet };
      }
      case Kind.INLINE_FRAGMENT: {
        const selectionSet = this.inlineSelectionSet(selection.selectionSet);
        return selectionSet === selection.selectionSet
          ? selection
          : { ...selection, selectionSet };
      }
      case Kind.FRAGMENT_SPREAD:
        return this._inlineSpread(selection);
    }
  }

  _inlineSpread(spread: FragmentSpreadNode): InlineFragmentNode {
    const fragmentName = spread.name.value;

    const cycleStart = this._path.indexOf(fragmentName);
    if (cycleStart !== -1) {
      throw new CyclicFragmentError(
        [...this._path.slice(cycleStart), fragmentName],
        locatedAt(spread),
      );
    }

    const fragment = this._fragmentDefinitions.get(fragmentName);
    if (fragment === undefined) {
      throw new FragmentNotFoundError(fragmentName, locatedAt(spread));
    }

    let selectionSet = this._inlinedFragments.get(fragmentName);
    if (selectionSet === undefined) {
      this.usedFragments.set(fragmentName, fragment);
      this._path.push(fragmentName);
      selectionSet = this.inlineSelectionSet(fragment.selectionSet);
      this._path.pop();
      this._inlinedFragments.set(fragmentName, selectionSet);
    }

    const inlineFragment: InlineFragmentNode = {
      kind: Kind.INLINE_FRAGMENT,
      typeCondition: fragment.typeCondition,
      directives: spread.directives,
      selectionSet,
    };

    return spread.loc === undefined
      ? inlineFragment
      : { ...inlineFragment, loc: spread.loc };
  }
}
