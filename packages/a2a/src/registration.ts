/**
 * Registration plan of a locally served agent: the endpoints it is reachable
 * at and the card it is published with
 */

import type { AgentCard } from '@a2a-js/sdk';
import {
  type AgentRegistrationInput,
  AgentRegistrationSchema,
  ConfigError,
  createSilentLogger,
  formatConfigError,
  type Logger,
  type TransportProperties
} from '@registry-bridge/core';
import { DEFAULT_PREFERRED_TRANSPORT } from './card-converter.js';

export const TRANSPORT_ENV_PREFIX = 'NACOS_A2A_AGENT_';
export const DEFAULT_ENDPOINT_PATH = '/a2a/';
/** Endpoint protocol that is rewritten to http or https depending on TLS */
export const DEFAULT_ENDPOINT_PROTOCOL = 'HTTP';

export type EnvSource = Record<string, string | undefined>;

/**
 * Address the agent is served at
 */
export type DeployInfo = {
  host: string;
  port: number;
};

export type TransportEndpoint = {
  transport: string;
  address: string;
  port: number;
  path?: string;
  protocol?: string;
  query?: string;
  supportTls: boolean;
};

export type RegistrationPlan = {
  card: AgentCard;
  endpoints: TransportEndpoint[];
  registerAsLatest: boolean;
  enabledRegisterEndpoint: boolean;
};

export type BuildRegistrationPlanOptions = {
  env?: EnvSource;
  logger?: Logger;
};

const hasText = (value: string | undefined): value is string =>
  value !== undefined && value.trim().length > 0;

/**
 * Transport properties set through `NACOS_A2A_AGENT_<TRANSPORT>_<ATTRIBUTE>`
 *
 * The attribute is the last `_` segment, so transport names may contain `_`.
 */
export function transportPropertiesFromEnv(
  env: EnvSource = process.env,
  logger: Logger = createSilentLogger()
): Record<string, TransportProperties> {
  const result: Record<string, TransportProperties> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(TRANSPORT_ENV_PREFIX) || value === undefined) continue;
    const rest = key.slice(TRANSPORT_ENV_PREFIX.length);
    const split = rest.lastIndexOf('_');
    if (split <= 0) continue;

    const transport = rest.slice(0, split).toUpperCase();
    const properties = result[transport] ?? {};
    switch (rest.slice(split + 1).toUpperCase()) {
      case 'HOST':
        properties.host = value;
        break;
      case 'PORT': {
        const port = Number.parseInt(value, 10);
        if (Number.isNaN(port)) {
          logger.warn(`Ignoring ${key}: port is not a number`, { value });
          continue;
        }
        properties.port = port;
        break;
      }
      case 'PATH':
        properties.path = value;
        break;
      case 'PROTOCOL':
        properties.protocol = value;
        break;
      case 'QUERY':
        properties.query = value;
        break;
      case 'SUPPORTTLS':
        properties.supportTls = value.trim().toLowerCase() === 'true';
        break;
      default:
        logger.debug(`Ignoring unknown transport attribute ${key}`);
        continue;
    }
    result[transport] = properties;
  }
  return result;
}

/**
 * Overlay set attributes: non-blank strings, positive ports, defined flags
 */
export function mergeTransportProperties(
  base: TransportProperties,
  overlay: TransportProperties
): TransportProperties {
  const merged: TransportProperties = { ...base };
  if (hasText(overlay.host)) merged.host = overlay.host;
  if (overlay.port !== undefined && overlay.port > 0) merged.port = overlay.port;
  if (hasText(overlay.path)) merged.path = overlay.path;
  if (hasText(overlay.protocol)) merged.protocol = overlay.protocol;
  if (hasText(overlay.query)) merged.query = overlay.query;
  if (overlay.supportTls !== undefined) merged.supportTls = overlay.supportTls;
  return merged;
}

/**
 * Configured transports keyed by upper-cased name, environment on top
 */
export function resolveTransportProperties(
  configured: Record<string, TransportProperties>,
  env: EnvSource = process.env,
  logger?: Logger
): Map<string, TransportProperties> {
  const result = new Map<string, TransportProperties>();
  for (const [transport, properties] of Object.entries(configured)) {
    result.set(transport.toUpperCase(), { ...properties });
  }
  for (const [transport, properties] of Object.entries(transportPropertiesFromEnv(env, logger))) {
    const existing = result.get(transport);
    result.set(transport, existing ? mergeTransportProperties(existing, properties) : properties);
  }
  return result;
}

/**
 * `protocol://address:port/path?query`
 */
export function endpointUrl(endpoint: TransportEndpoint): string {
  let protocol = hasText(endpoint.protocol) ? endpoint.protocol : DEFAULT_ENDPOINT_PROTOCOL;
  if (protocol.toUpperCase() === DEFAULT_ENDPOINT_PROTOCOL) {
    protocol = endpoint.supportTls ? 'https' : 'http';
  }
  let url = `${protocol}://${endpoint.address}:${endpoint.port}`;
  if (hasText(endpoint.path)) {
    url += endpoint.path.startsWith('/') ? endpoint.path : `/${endpoint.path}`;
  }
  if (hasText(endpoint.query)) {
    url += `?${endpoint.query}`;
  }
  return url;
}

export function parseAgentRegistration(input: AgentRegistrationInput = {}) {
  const result = AgentRegistrationSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatConfigError(result.error));
  }
  return result.data;
}

/**
 * Endpoints to register and the card to publish for an agent served at `deploy`
 *
 * The card's preferred transport is served at the deploy address under
 * `/a2a/`. Configured and environment transports overwrite its attributes or
 * add transports the agent itself does not serve.
 */
export function buildRegistrationPlan(
  card: AgentCard,
  input: AgentRegistrationInput,
  deploy: DeployInfo,
  options: BuildRegistrationPlanOptions = {}
): RegistrationPlan {
  const logger = options.logger ?? createSilentLogger();
  const properties = parseAgentRegistration(input);

  const endpoints = new Map<string, TransportEndpoint>();
  const served = (card.preferredTransport ?? DEFAULT_PREFERRED_TRANSPORT).toUpperCase();
  endpoints.set(served, {
    transport: served,
    address: deploy.host,
    port: deploy.port,
    path: DEFAULT_ENDPOINT_PATH,
    supportTls: false
  });

  const transports = resolveTransportProperties(properties.transports, options.env, logger);
  for (const [transport, overlay] of transports) {
    const existing = endpoints.get(transport);
    if (!existing) {
      logger.warn(
        `Transport ${transport} is not served by the agent, the agent card might include an unavailable endpoint`
      );
    }
    const endpoint = overwriteEndpoint(transport, existing, overlay);
    if (!endpoint) {
      logger.warn(`Transport ${transport} has no host or port, skipping it`);
      continue;
    }
    endpoints.set(transport, endpoint);
  }

  return {
    card: overwritePreferredTransport(card, properties.overwritePreferredTransport, endpoints, logger),
    endpoints: [...endpoints.values()],
    registerAsLatest: properties.registerAsLatest,
    enabledRegisterEndpoint: properties.enabledRegisterEndpoint
  };
}

function overwriteEndpoint(
  transport: string,
  existing: TransportEndpoint | undefined,
  overlay: TransportProperties
): TransportEndpoint | undefined {
  const merged = mergeTransportProperties(
    existing
      ? {
          host: existing.address,
          port: existing.port,
          path: existing.path,
          protocol: existing.protocol,
          query: existing.query,
          supportTls: existing.supportTls
        }
      : {},
    overlay
  );
  if (!hasText(merged.host) || merged.port === undefined) return undefined;

  const endpoint: TransportEndpoint = {
    transport,
    address: merged.host,
    port: merged.port,
    supportTls: merged.supportTls ?? false
  };
  if (merged.path !== undefined) endpoint.path = merged.path;
  if (merged.protocol !== undefined) endpoint.protocol = merged.protocol;
  if (merged.query !== undefined) endpoint.query = merged.query;
  return endpoint;
}

function overwritePreferredTransport(
  card: AgentCard,
  preferred: string | undefined,
  endpoints: Map<string, TransportEndpoint>,
  logger: Logger
): AgentCard {
  if (!hasText(preferred)) return card;

  const transport = preferred.toUpperCase();
  const endpoint = endpoints.get(transport);
  if (!endpoint) {
    logger.warn(
      `Preferred transport ${transport} is not found, keeping ${card.preferredTransport ?? DEFAULT_PREFERRED_TRANSPORT} with url ${card.url}`
    );
    return card;
  }

  const url = endpointUrl(endpoint);
  logger.info(`Overwrite preferred transport of ${card.name} to ${transport} with url ${url}`);
  return {
    ...card,
    url,
    preferredTransport: transport,
    additionalInterfaces: [...(card.additionalInterfaces ?? []), { transport, url }]
  };
}
