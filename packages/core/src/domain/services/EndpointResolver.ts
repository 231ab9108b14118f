import { ConfigurationError } from '../errors/ScrollSourceError.js';

/** Node used when none is configured. */
export const DEFAULT_NODE = 'http://localhost:9200';

/** A node list as accepted from configuration: absent, one node, or an ordered list. */
export type NodesInput = string | readonly string[] | undefined;

/**
 * Normalize configured nodes into base URLs of the form `scheme://host[:port]`.
 *
 * Path, query, fragment and credentials are dropped. An explicit port is
 * kept even when it is the scheme default (`http://h:80`). Order is preserved
 * and duplicates are kept.
 *
 * @throws ConfigurationError when the list is empty or an entry lacks an explicit `protocol://` prefix.
 */
export function resolveEndpoints(nodes?: NodesInput): string[] {
  const entries: readonly string[] = nodes === undefined ? [DEFAULT_NODE] : typeof nodes === 'string' ? [nodes] : nodes;

  if (entries.length === 0) {
    throw new ConfigurationError('At least one node is required');
  }

  return entries.map(toBaseUrl);
}

function toBaseUrl(node: string): string {
  if (!node.includes('//')) {
    throw new ConfigurationError(`Please provide the list of nodes in 'protocol://host:port' format, got '${node}'`, {
      node,
    });
  }

  let url: URL;
  try {
    url = new URL(node);
  } catch (error) {
    throw new ConfigurationError(`Node '${node}' is not a valid URL: ${error instanceof Error ? error.message : String(error)}`, {
      node,
    });
  }

  if (url.host === '') {
    throw new ConfigurationError(`Node '${node}' has no host`, { node });
  }

  // URL reports a default port as ''; restore it when the entry spells it out.
  return `${url.protocol}//${url.host}${url.port === '' ? explicitPort(node) : ''}`;
}

function explicitPort(node: string): string {
  const authority = node.slice(node.indexOf('//') + 2).split(/[/?#]/, 1)[0] ?? '';
  const hostAndPort = authority.slice(authority.lastIndexOf('@') + 1);
  const port = /:(\d+)$/.exec(hostAndPort)?.[1];
  return port === undefined ? '' : `:${String(Number(port))}`;
}
