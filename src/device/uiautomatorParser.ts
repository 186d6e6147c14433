import { RawNode, Rect } from '../types';

const TAG_PATTERN = /<node\b((?:[^>"]|"[^"]*")*?)(\/?)>|<\/node\s*>/g;
const ATTRIBUTE_PATTERN = /([\w:-]+)="([^"]*)"/g;
const BOUNDS_PATTERN = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

export function decodeXmlEntities(value: string): string {
  return value.replace(/&(#x[0-9a-fA-F]+|#\d+|\w+);/g, (entity, name: string) => {
    if (name.startsWith('#x')) {
      return String.fromCodePoint(parseInt(name.slice(2), 16));
    }
    if (name.startsWith('#')) {
      return String.fromCodePoint(parseInt(name.slice(1), 10));
    }
    return ENTITIES[name] ?? entity;
  });
}

function parseAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of source.matchAll(ATTRIBUTE_PATTERN)) {
    attributes.set(match[1], decodeXmlEntities(match[2]));
  }
  return attributes;
}

export function parseBounds(value: string | undefined): Rect {
  const match = value ? BOUNDS_PATTERN.exec(value) : null;
  if (!match) {
    return { left: 0, top: 0, right: 0, bottom: 0 };
  }
  return {
    left: parseInt(match[1], 10),
    top: parseInt(match[2], 10),
    right: parseInt(match[3], 10),
    bottom: parseInt(match[4], 10),
  };
}

function toNode(attributes: Map<string, string>): RawNode {
  const flag = (name: string) => attributes.get(name) === 'true';
  const className = attributes.get('class') ?? '';
  return {
    text: attributes.get('text') ?? '',
    contentDescription: attributes.get('content-desc') ?? '',
    resourceId: attributes.get('resource-id') ?? '',
    className,
    packageName: attributes.get('package') ?? '',
    bounds: parseBounds(attributes.get('bounds')),
    clickable: flag('clickable'),
    longClickable: flag('long-clickable'),
    editable: className.endsWith('EditText') || flag('editable'),
    focused: flag('focused'),
    selected: flag('selected'),
    checked: flag('checked'),
    checkable: flag('checkable'),
    scrollable: flag('scrollable'),
    focusable: flag('focusable'),
    // uiautomator omits the attribute on very old releases
    enabled: attributes.get('enabled') !== 'false',
    children: [],
  };
}

function enclosingBounds(nodes: RawNode[]): Rect {
  return {
    left: Math.min(...nodes.map(node => node.bounds.left)),
    top: Math.min(...nodes.map(node => node.bounds.top)),
    right: Math.max(...nodes.map(node => node.bounds.right)),
    bottom: Math.max(...nodes.map(node => node.bounds.bottom)),
  };
}

/**
 * Builds a node tree from a `uiautomator dump` document. Returns null when the
 * document holds no nodes. Several top-level windows are wrapped in one
 * unlabelled container.
 */
export function parseUiHierarchy(xml: string): RawNode | null {
  const roots: RawNode[] = [];
  const stack: RawNode[] = [];

  for (const match of xml.matchAll(TAG_PATTERN)) {
    if (match[0].startsWith('</')) {
      stack.pop();
      continue;
    }

    const node = toNode(parseAttributes(match[1]));
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    if (match[2] !== '/') {
      stack.push(node);
    }
  }

  if (roots.length === 0) {
    return null;
  }
  if (roots.length === 1) {
    return roots[0];
  }

  return {
    ...toNode(new Map()),
    packageName: roots[0].packageName,
    bounds: enclosingBounds(roots),
    children: roots,
  };
}
