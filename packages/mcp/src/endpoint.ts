import {
  type McpEndpoint,
  type McpServerDetail,
  ResourceNotFoundError
} from '@registry-bridge/core';

/**
 * Where and how to reach one MCP server
 */
export type McpTarget = {
  name: string;
  protocol: string;
  url: string;
  headers?: Record<string, string>;
};

const hasText = (value: string | undefined): value is string =>
  value !== undefined && value.trim() !== '';

/**
 * Protocol clients speak to the server: the front protocol when set
 */
export function resolveMcpProtocol(detail: McpServerDetail): string {
  return hasText(detail.frontProtocol) ? detail.frontProtocol : detail.protocol;
}

export function endpointUrl(endpoint: McpEndpoint): string {
  const scheme = hasText(endpoint.protocol) ? endpoint.protocol : 'http';
  let path = endpoint.path?.trim() ?? '';
  if (path && !path.startsWith('/')) path = `/${path}`;
  return `${scheme}://${endpoint.address}:${endpoint.port}${path}`;
}

/**
 * Pick the endpoint to connect to
 *
 * Frontend endpoints (gateways) come before backend ones; the first entry is
 * used, with no health check.
 */
export function selectEndpoint(detail: McpServerDetail): McpEndpoint {
  const frontend = detail.frontendEndpoints ?? [];
  const candidates = frontend.length > 0 ? frontend : (detail.backendEndpoints ?? []);
  const [endpoint] = candidates;
  if (!endpoint) {
    throw new ResourceNotFoundError('endpoint', detail.name, {
      message: `No endpoint found for MCP server ${detail.name}`
    });
  }
  return endpoint;
}

export function resolveMcpTarget(detail: McpServerDetail): McpTarget {
  const endpoint = selectEndpoint(detail);
  const target: McpTarget = {
    name: detail.name,
    protocol: resolveMcpProtocol(detail),
    url: endpointUrl(endpoint)
  };
  if (endpoint.headers && Object.keys(endpoint.headers).length > 0) {
    target.headers = { ...endpoint.headers };
  }
  return target;
}
