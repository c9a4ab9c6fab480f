import { OperationNode } from './types';

export function assertNever(value: never): never {
  throw new Error(`Unexpected operation: ${JSON.stringify(value)}`);
}

/**
 * Direct children of an operation, in source order.
 */
export function childrenOf(node: OperationNode): OperationNode[] {
  switch (node.kind) {
    case 'Block':
      return [...node.operations];
    case 'ExpressionStatement':
      return [node.operation];
    case 'VariableDeclaration':
      return present(node.initializer);
    case 'Return':
      return present(node.returnedValue);
    case 'Throw':
      return present(node.exception);
    case 'Conditional':
      return [node.condition, node.whenTrue, ...present(node.whenFalse)];
    case 'Literal':
    case 'LocalReference':
    case 'ParameterReference':
    case 'InstanceReference':
      return [];
    case 'FieldReference':
      return present(node.instance);
    case 'SimpleAssignment':
      return [...present(node.target), ...present(node.value)];
    case 'Binary':
      return [node.left, node.right];
    case 'Conversion':
      return [node.operand];
    case 'Invocation':
      return [...present(node.instance), ...node.arguments];
    case 'ObjectCreation':
      return [...node.arguments];
    case 'DelegateCreation':
      return [node.target];
    case 'AnonymousFunction':
      return [node.body];
    case 'MethodReference':
      return present(node.instance);
    case 'Invalid':
      return [...node.children];
    default:
      return assertNever(node);
  }
}

function present(node: OperationNode | null): OperationNode[] {
  return node === null ? [] : [node];
}

/**
 * All nodes below `root` (excluding `root`) in depth-first pre-order.
 * Each iteration starts a fresh walk.
 */
export function descendants(root: OperationNode): Iterable<OperationNode> {
  return {
    *[Symbol.iterator]() {
      const stack = childrenOf(root).reverse();
      while (stack.length > 0) {
        const node = stack.pop();
        if (node === undefined) break;
        yield node;
        const children = childrenOf(node);
        for (let i = children.length - 1; i >= 0; i--) {
          stack.push(children[i]);
        }
      }
    }
  };
}

/**
 * `root` followed by its descendants.
 */
export function descendantsAndSelf(root: OperationNode): Iterable<OperationNode> {
  return {
    *[Symbol.iterator]() {
      yield root;
      yield* descendants(root);
    }
  };
}

/**
 * True when `node` and everything below it were synthesized by the host.
 */
export function isFullySynthesized(node: OperationNode): boolean {
  if (!node.isImplicit) {
    return false;
  }
  for (const descendant of descendants(node)) {
    if (!descendant.isImplicit) {
      return false;
    }
  }
  return true;
}

/**
 * Drops fully host-synthesized nodes, keeping the relative order of the rest.
 * An implicit wrapper around user-written code is kept.
 */
export function withoutSynthesized(operations: Iterable<OperationNode>): Iterable<OperationNode> {
  return {
    *[Symbol.iterator]() {
      for (const operation of operations) {
        if (!isFullySynthesized(operation)) {
          yield operation;
        }
      }
    }
  };
}
