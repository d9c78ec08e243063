/**
 * Proxy Sources
 * Parsing and filtering of records coming from the online API and custom files
 */

import { z } from 'zod';
import { SchemaError } from '../errors';
import {
  PoolFilter,
  ProxyProtocol,
  ProxyRecord,
  defaultPort,
  isProxyProtocol,
  isValidPort,
} from './proxy.types';

/**
 * Record as parsed from a source, before filtering and favorites tagging
 */
export type RawRecord = Omit<ProxyRecord, 'isFavorite' | 'observedIp'>;

const portSchema = z.union([z.number(), z.string().regex(/^\d+$/)]).transform(Number);

// geonode-style entry: ports arrive as strings, latency as a float
const apiEntrySchema = z.object({
  ip: z.string().min(1),
  port: portSchema,
  country: z.string().optional(),
  latency: z.number().nonnegative(),
  protocols: z.array(z.string()),
  lastChecked: z.number().optional(),
});

const apiEnvelopeSchema = z.object({
  data: z.array(z.unknown()),
});

const fileRecordSchema = z.object({
  host: z.string().min(1),
  port: portSchema,
  protocol: z.string().default(ProxyProtocol.HTTP),
  country: z.string().optional(),
  latencyMs: z.number().nonnegative().optional(),
});

/**
 * Parse the online API envelope. Throws SchemaError when there is no top-level record list;
 * entries that do not parse, or do not pass the filter, are dropped.
 */
export function parseApiResponse(body: unknown, filter: PoolFilter): RawRecord[] {
  const envelope = apiEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new SchemaError('API response has no "data" record list', envelope.error);
  }

  const records: RawRecord[] = [];
  for (const item of envelope.data.data) {
    const entry = apiEntrySchema.safeParse(item);
    if (!entry.success || !isValidPort(entry.data.port)) {
      continue;
    }
    const { ip, port, country, latency, protocols, lastChecked } = entry.data;

    // First preferred protocol the proxy advertises, not the fastest
    const protocol = filter.protocolPreference.find(preferred => protocols.includes(preferred));
    if (!protocol) {
      continue;
    }

    const record: RawRecord = {
      host: ip,
      port,
      protocol,
      country,
      latencyMs: Math.round(latency),
      lastChecked: lastChecked !== undefined ? lastChecked * 1000 : undefined,
    };
    if (passesFilter(record, filter)) {
      records.push(record);
    }
  }
  return records;
}

/**
 * Parse one line of a custom proxy file. Returns null for comments, blanks and malformed lines.
 */
export function parseProxyLine(line: string): RawRecord | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return null;
  }

  if (trimmed.startsWith('{')) {
    return parseStructuredLine(trimmed);
  }

  const [host, portPart, protocolPart] = trimmed.split(':').map(part => part.trim());
  if (!host) {
    return null;
  }

  const protocol = (protocolPart || ProxyProtocol.HTTP).toLowerCase();
  if (!isProxyProtocol(protocol)) {
    return null;
  }

  const port = portPart ? Number(portPart) : defaultPort(protocol);
  if (!isValidPort(port)) {
    return null;
  }

  return { host, port, protocol };
}

function parseStructuredLine(line: string): RawRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = fileRecordSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }

  const protocol = parsed.data.protocol.toLowerCase();
  if (!isProxyProtocol(protocol) || !isValidPort(parsed.data.port)) {
    return null;
  }

  return {
    host: parsed.data.host,
    port: parsed.data.port,
    protocol,
    country: parsed.data.country,
    latencyMs: parsed.data.latencyMs !== undefined ? Math.round(parsed.data.latencyMs) : undefined,
  };
}

/**
 * Parse a whole custom file and apply the pool filter
 */
export function parseProxyFile(content: string, filter: PoolFilter): RawRecord[] {
  return content
    .split(/\r?\n/)
    .map(parseProxyLine)
    .filter((record): record is RawRecord => record !== null && passesFilter(record, filter));
}

export function passesFilter(record: RawRecord, filter: PoolFilter): boolean {
  if (record.latencyMs !== undefined && record.latencyMs > filter.maxLatency) {
    return false;
  }
  if (filter.favoriteCountries.length > 0) {
    if (!record.country || !filter.favoriteCountries.includes(record.country)) {
      return false;
    }
  }
  return filter.protocolPreference.includes(record.protocol);
}
