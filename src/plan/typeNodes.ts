import type {
  ListTypeNode,
  NamedTypeNode,
  NullabilityAssertionNode,
  TypeNode,
} from '../language/ast.js';
import { Kind } from '../language/kinds.js';

export function getNamedTypeName(type: TypeNode): string {
  switch (type.kind) {
    case Kind.NAMED_TYPE:
      return type.name.value;
    case Kind.LIST_TYPE:
    case Kind.NON_NULL_TYPE:
      return getNamedTypeName(type.type);
  }
}

export function getNullableTypeNode(
  type: TypeNode,
): NamedTypeNode | ListTypeNode {
  return type.kind === Kind.NON_NULL_TYPE ? type.type : type;
}

export function isListTypeNode(type: TypeNode): boolean {
  return getNullableTypeNode(type).kind === Kind.LIST_TYPE;
}

/**
 * Applies a client controlled nullability modifier to a field's type.
 * Each `[]` steps into one list level, `!` makes the level non-null and `?`
 * makes it nullable.
 *
 * Returns undefined when the modifier nests more lists than the type has.
 */
export function applyNullabilityAssertion(
  type: TypeNode,
  assertion: NullabilityAssertionNode | undefined,
): TypeNode | undefined {
  if (assertion === undefined) {
    return type;
  }

  switch (assertion.kind) {
    case Kind.LIST_NULLABILITY: {
      const nullableType = getNullableTypeNode(type);
      if (nullableType.kind !== Kind.LIST_TYPE) {
        return undefined;
      }
      const itemType = applyNullabilityAssertion(
        nullableType.type,
        assertion.element,
      );
      if (itemType === undefined) {
        return undefined;
      }
      const listType: ListTypeNode = { kind: Kind.LIST_TYPE, type: itemType };
      return type.kind === Kind.NON_NULL_TYPE
        ? { kind: Kind.NON_NULL_TYPE, type: listType }
        : listType;
    }
    case Kind.REQUIRED_MODIFIER: {
      const modified = applyNullabilityAssertion(
        getNullableTypeNode(type),
        assertion.element,
      );
      return modified === undefined
        ? undefined
        : { kind: Kind.NON_NULL_TYPE, type: getNullableTypeNode(modified) };
    }
    case Kind.OPTIONAL_MODIFIER: {
      const modified = applyNullabilityAssertion(type, assertion.element);
      return modified === undefined ? undefined : getNullableTypeNode(modified);
    }
  }
}
