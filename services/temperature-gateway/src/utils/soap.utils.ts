import { parseStringPromise, Builder } from 'xml2js';
import { Namespaces } from '../../../../shared/config/index.js';
import { isRecord } from '../../../../shared/utils/index.js';

const xmlBuilder = new Builder({
  xmldec: { version: '1.0', encoding: 'UTF-8' },
  renderOpts: { pretty: false },
  headless: false,
});

export interface WSDLDescription {
  targetNamespace: string;
  endpoint?: string;
  operations: string[];
}

export type SOAPResponse =
  | { kind: 'result'; value: string }
  | { kind: 'fault'; faultCode: string; faultString: string }
  | { kind: 'malformed'; reason: string };

/**
 * Parse XML with namespace prefixes stripped from element names, so that
 * `soap:Envelope`, `SOAP-ENV:Envelope` and `Envelope` all read the same.
 */
export async function parseXML(xml: string): Promise<unknown> {
  const parsed: unknown = await parseStringPromise(xml, {
    explicitArray: false,
    ignoreAttrs: false,
    tagNameProcessors: [(name: string) => name.replace(/^.*:/, '')],
    trim: true,
    normalize: true,
  });
  return parsed;
}

function toArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined ? [] : [value];
}

function attribute(node: unknown, name: string): string | undefined {
  if (!isRecord(node) || !isRecord(node['$'])) return undefined;
  const value = node['$'][name];
  return typeof value === 'string' ? value : undefined;
}

function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (!isRecord(node)) return undefined;
  const text = node['_'];
  if (typeof text === 'string') return text;
  // element carrying only attributes
  return '';
}

export async function parseWSDL(xml: string): Promise<WSDLDescription> {
  const parsed = await parseXML(xml);
  const definitions = isRecord(parsed) ? parsed['definitions'] : undefined;
  if (!isRecord(definitions)) throw new Error('Invalid WSDL: missing definitions element');

  const targetNamespace = attribute(definitions, 'targetNamespace');
  if (!targetNamespace) throw new Error('Invalid WSDL: missing targetNamespace');

  const operations = new Set<string>();
  for (const portType of toArray(definitions['portType'])) {
    if (!isRecord(portType)) continue;
    for (const operation of toArray(portType['operation'])) {
      const name = attribute(operation, 'name');
      if (name) operations.add(name);
    }
  }

  let endpoint: string | undefined;
  for (const service of toArray(definitions['service'])) {
    if (!isRecord(service)) continue;
    for (const port of toArray(service['port'])) {
      if (!isRecord(port)) continue;
      endpoint = attribute(port['address'], 'location');
      if (endpoint) break;
    }
    if (endpoint) break;
  }

  return {
    targetNamespace,
    ...(endpoint && { endpoint }),
    operations: [...operations],
  };
}

export function buildSOAPRequest(operation: string, argument: string, value: string, namespace: string): string {
  const envelope = {
    'soap:Envelope': {
      '$': { 'xmlns:soap': Namespaces.soap },
      'soap:Body': {
        [operation]: {
          '$': { xmlns: namespace },
          [argument]: value,
        },
      },
    },
  };
  return xmlBuilder.buildObject(envelope);
}

/**
 * SOAPAction header value for a SOAP 1.1 call; .asmx services expect the
 * namespace and operation joined with exactly one slash.
 */
export function soapActionFor(namespace: string, operation: string): string {
  const base = namespace.endsWith('/') ? namespace : `${namespace}/`;
  return `"${base}${operation}"`;
}

export async function parseSOAPResponse(operation: string, xml: string): Promise<SOAPResponse> {
  let parsed: unknown;
  try {
    parsed = await parseXML(xml);
  } catch (error) {
    return { kind: 'malformed', reason: 'Response is not valid XML' };
  }

  const envelope = isRecord(parsed) ? parsed['Envelope'] : undefined;
  if (!isRecord(envelope)) return { kind: 'malformed', reason: 'Invalid SOAP envelope' };

  const body = envelope['Body'];
  if (!isRecord(body)) return { kind: 'malformed', reason: 'Missing SOAP body' };

  const fault = body['Fault'];
  if (fault !== undefined) {
    const faultRecord = isRecord(fault) ? fault : {};
    return {
      kind: 'fault',
      faultCode: textOf(faultRecord['faultcode']) || 'soap:Server',
      faultString: textOf(faultRecord['faultstring']) || 'Unknown SOAP fault',
    };
  }

  const response = body[`${operation}Response`];
  if (!isRecord(response)) {
    return { kind: 'malformed', reason: `Missing ${operation}Response element` };
  }

  const value = textOf(response[`${operation}Result`]);
  if (value === undefined) {
    return { kind: 'malformed', reason: `Missing ${operation}Result element` };
  }

  return { kind: 'result', value };
}
