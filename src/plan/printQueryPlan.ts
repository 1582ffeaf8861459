import { print } from '../language/printer.js';

import type {
  DeferPlanNode,
  PlanField,
  QueryPlan,
  QueryPlanNode,
  ResponsePath,
  VariableReference,
} from './QueryPlanNode.js';

function generateIndent(indent: number): string {
  return ' '.repeat(indent);
}

/**
 * Renders a plan as indented text, the operation tree first and then each
 * deferred fragment.
 */
export function printQueryPlan(plan: QueryPlan): string {
  return [plan.root, ...plan.deferred]
    .map((node) => printPlanNode(node, 0))
    .join('\n');
}

export function printPlanNode(node: QueryPlanNode, indent: number): string {
  const spaces = generateIndent(indent);
  const entries: Array<string> = [];

  switch (node.kind) {
    case 'Operation':
      entries.push(
        `${spaces}Operation: ${node.operationType}${
          node.name === undefined ? '' : ` ${node.name}`
        }`,
      );
      if (node.node !== undefined) {
        entries.push(printPlanNode(node.node, indent + 2));
      }
      break;
    case 'Serial':
    case 'Parallel':
      entries.push(`${spaces}${node.kind}:`);
      for (const child of node.nodes) {
        entries.push(printPlanNode(child, indent + 2));
      }
      break;
    case 'Resolver':
      entries.push(`${spaces}Resolver ${printField(node.field)}`);
      break;
    case 'Composite':
    case 'Subscription':
      entries.push(
        `${spaces}${node.kind} ${printField(node.field)}${
          node.node === undefined ? '' : ':'
        }`,
      );
      if (node.node !== undefined) {
        entries.push(printPlanNode(node.node, indent + 2));
      }
      break;
    case 'Stream':
      entries.push(
        `${spaces}Stream #${node.id} ${printPath(node.path)} (${printOptions([
          ['initialCount', printValue(node.initialCount)],
          ['label', printLabel(node.label)],
          ['if', printValue(node.if)],
        ])}):`,
      );
      entries.push(printPlanNode(node.node, indent + 2));
      break;
    case 'Defer':
      entries.push(printDefer(node, spaces));
      if (node.node !== undefined) {
        entries.push(printPlanNode(node.node, indent + 2));
      }
      for (const nested of node.deferred) {
        entries.push(printPlanNode(nested, indent + 2));
      }
      break;
  }

  return entries.join('\n');
}

function printDefer(node: DeferPlanNode, spaces: string): string {
  const location = node.path.length === 0 ? 'root' : printPath(node.path);
  const options = printOptions([
    ['label', printLabel(node.label)],
    ['if', printValue(node.if)],
  ]);
  const hasChildren = node.node !== undefined || node.deferred.length > 0;
  return `${spaces}Defer at ${location} on ${node.parentType}${
    options === '' ? '' : ` (${options})`
  }${hasChildren ? ':' : ''}`;
}

function printField(field: PlanField): string {
  return `${printPath(field.path)} (${field.parentType}.${
    field.fieldName
  }: ${print(field.resultType)})`;
}

function printPath(path: ResponsePath): string {
  return `'${path.join('.')}'`;
}

function printLabel(label: string | undefined): string | undefined {
  return label === undefined ? undefined : JSON.stringify(label);
}

function printValue(
  value: number | VariableReference | undefined,
): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return typeof value === 'number' ? String(value) : `$${value.variable}`;
}

function printOptions(
  options: ReadonlyArray<[string, string | undefined]>,
): string {
  return options
    .filter((option): option is [string, string] => option[1] !== undefined)
    .map(([name, value]) => `${name}: ${value}`)
    .join(', ');
}
