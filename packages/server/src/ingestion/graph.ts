/**
 * `terraform graph` DOT output to adjacency JSON
 *
 * Handles both the legacy layout (`"[root] aws_instance.web (expand)"` node
 * ids inside a `subgraph "root"`) and the plain layout of newer terraform
 * releases. Node ids are normalised to the Terraform address.
 */

import type { ModuleGraph } from '@terrashelf/protocol';

type NodeType = ModuleGraph['nodes'][number]['type'];

const QUOTED = String.raw`"((?:[^"\\]|\\.)*)"`;
const BARE = String.raw`([A-Za-z0-9_.\-]+)`;
const ID = `(?:${QUOTED}|${BARE})`;

const EDGE_PATTERN = new RegExp(`^${ID}\\s*->\\s*${ID}`);
const NODE_PATTERN = new RegExp(`^${ID}\\s*\\[(.*)\\]$`);
const LABEL_PATTERN = new RegExp(`label\\s*=\\s*${ID}`);

// Graph-level statements and attribute defaults
const SKIPPED_STATEMENT = /^(?:(?:digraph|subgraph|graph|node|edge|strict)(?=[\s[{]|$)|[{}])/;

function unescape(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

function captured(match: RegExpExecArray, quotedIndex: number): string | null {
  const quoted = match[quotedIndex];
  if (quoted !== undefined) return unescape(quoted);
  return match[quotedIndex + 1] ?? null;
}

/**
 * Strip the `[root] ` module prefix and ` (expand)` / ` (close)` suffixes
 */
export function normalizeGraphAddress(id: string): string {
  return id
    .replace(/^\[root\]\s+/, '')
    .replace(/\s+\((expand|close|prepare state)\)$/, '')
    .trim();
}

export function classifyGraphNode(address: string): NodeType {
  if (address.startsWith('provider[') || address.startsWith('provider.')) return 'provider';
  if (address.startsWith('data.')) return 'data';
  if (address.startsWith('module.')) return 'module';
  if (address.startsWith('var.')) return 'var';
  if (address.startsWith('output.')) return 'output';
  if (address.startsWith('local.')) return 'local';
  if (/^[a-z0-9]+_[a-z0-9_]+\.[A-Za-z0-9_-]+$/.test(address)) return 'resource';
  return 'other';
}

// Internal bookkeeping nodes terraform adds to every graph
function isInternalNode(address: string): boolean {
  return address === '' || address === 'root' || address.startsWith('meta.');
}

/**
 * Parse DOT text into nodes and edges. Unknown statements are ignored.
 */
export function parseDotGraph(dot: string): ModuleGraph {
  const nodes = new Map<string, ModuleGraph['nodes'][number]>();
  const edges = new Map<string, ModuleGraph['edges'][number]>();

  const addNode = (rawId: string, label?: string): string | null => {
    // Close nodes mirror their open node with the edges reversed
    if (/\(close\)$/.test(rawId.trim())) return null;
    const id = normalizeGraphAddress(rawId);
    if (isInternalNode(id)) return null;
    if (!nodes.has(id)) {
      const display = label !== undefined ? normalizeGraphAddress(label) : id;
      nodes.set(id, { id, label: display, type: classifyGraphNode(id) });
    }
    return id;
  };

  for (const rawLine of dot.split('\n')) {
    const line = rawLine.trim().replace(/;$/, '').trim();
    if (line === '' || line.startsWith('//') || line.startsWith('#')) continue;

    const edge = EDGE_PATTERN.exec(line);
    if (edge) {
      const from = captured(edge, 1);
      const to = captured(edge, 3);
      if (from === null || to === null) continue;
      const source = addNode(from);
      const target = addNode(to);
      if (source !== null && target !== null && source !== target) {
        edges.set(`${source}\u0000${target}`, { source, target });
      }
      continue;
    }

    if (SKIPPED_STATEMENT.test(line)) continue;

    const node = NODE_PATTERN.exec(line);
    if (node) {
      const id = captured(node, 1);
      if (id === null) continue;
      const label = LABEL_PATTERN.exec(node[3] ?? '');
      addNode(id, label ? (captured(label, 1) ?? undefined) : undefined);
    }
  }

  return {
    nodes: [...nodes.values()].sort((a, b) => a.id.localeCompare(b.id)),
    edges: [...edges.values()].sort(
      (a, b) => a.source.localeCompare(b.source) || a.target.localeCompare(b.target)
    ),
  };
}
