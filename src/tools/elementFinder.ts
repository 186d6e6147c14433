import { RawNode } from '../types';
import { SelectorInput } from './schemas';

export type MatchedBy = 'resource_id' | 'text' | 'content_description' | 'class_name';

export interface ElementMatch {
  node: RawNode;
  matchedBy: MatchedBy;
  // The id form that matched, after package completion.
  resourceId?: string;
}

function findFirst(root: RawNode, predicate: (node: RawNode) => boolean): RawNode | null {
  const stack: RawNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (predicate(node)) {
      return node;
    }
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return null;
}

/**
 * Candidate ids for a resource-id selector. A bare name such as 'login' is also
 * tried as '<package>:id/login' using the package of the window root.
 */
export function resourceIdCandidates(resourceId: string, packageName: string): string[] {
  const candidates = [resourceId];
  if (!resourceId.includes(':') && packageName) {
    const name = resourceId.startsWith('id/') ? resourceId.slice(3) : resourceId;
    candidates.push(`${packageName}:id/${name}`);
  }
  return candidates;
}

/**
 * Finds the first element in document order. Selectors are tried in priority order
 * (resource_id, text, content_description, class_name); the first one given decides.
 */
export function findElement(root: RawNode, selector: SelectorInput): ElementMatch | null {
  if (selector.resource_id) {
    for (const candidate of resourceIdCandidates(selector.resource_id, root.packageName)) {
      const node = findFirst(root, n => n.resourceId === candidate);
      if (node) {
        return { node, matchedBy: 'resource_id', resourceId: candidate };
      }
    }
    return null;
  }

  if (selector.text) {
    const needle = selector.text.toLowerCase();
    const node = findFirst(root, n => n.text.toLowerCase().includes(needle));
    return node ? { node, matchedBy: 'text' } : null;
  }

  if (selector.content_description) {
    const wanted = selector.content_description;
    const node = findFirst(root, n => n.contentDescription === wanted);
    return node ? { node, matchedBy: 'content_description' } : null;
  }

  if (selector.class_name) {
    const wanted = selector.class_name;
    const node = findFirst(root, n => n.className === wanted);
    return node ? { node, matchedBy: 'class_name' } : null;
  }

  return null;
}

export function describeSelector(selector: SelectorInput): string {
  const parts: string[] = [];
  if (selector.resource_id) parts.push(`resource_id=${selector.resource_id}`);
  if (selector.text) parts.push(`text=${selector.text}`);
  if (selector.content_description) {
    parts.push(`content_description=${selector.content_description}`);
  }
  if (selector.class_name) parts.push(`class_name=${selector.class_name}`);
  return parts.join(', ');
}
