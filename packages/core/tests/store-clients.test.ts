/**
 * Store Client Tests
 *
 * Object store and graph layer clients against a mocked fetch: request
 * shapes, header handling and error mapping.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Mock } from 'vitest'
import { createObjectStoreClient } from '../src/store/object-store-client.js'
import { createGraphClient } from '../src/store/graph-client.js'
import { asciiJson, joinUrl } from '../src/store/http.js'
import { StoreRejected, StoreUnavailable } from '../src/errors.js'

// Mock global fetch
const originalFetch = global.fetch
let mockFetch: Mock<typeof fetch>

function setupMockFetch() {
  mockFetch = vi.fn<typeof fetch>()
  global.fetch = mockFetch
}

function restoreFetch() {
  global.fetch = originalFetch
}

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

function lastRequest(): { url: string; method: string; headers: Headers; body: unknown } {
  const call = mockFetch.mock.calls.at(-1)
  if (!call) throw new Error('fetch was not called')
  const [input, init] = call
  const body = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
  return {
    url: String(input),
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
    body,
  }
}

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

describe('http helpers', () => {
  it('joins without doubling slashes', () => {
    expect(joinUrl('http://store.test/', '/api/v1/objects')).toBe('http://store.test/api/v1/objects')
  })

  it('escapes non-ASCII characters for header values', () => {
    expect(asciiJson({ summary: 'Grüße' })).toBe('{"summary":"Gr\\u00fc\\u00dfe"}')
  })
})

// -------------------------------------------------------------------
// Object store
// -------------------------------------------------------------------

describe('ObjectStoreClient', () => {
  beforeEach(setupMockFetch)
  afterEach(restoreFetch)

  it('PUTs the payload under the given id', async () => {
    const client = createObjectStoreClient({ baseUrl: 'http://store.test/' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ object_id: 'event-abc' }))

    const ref = await client.putObject(
      'event-abc',
      { uid: 'x1', summary: 'Grüße' },
      { type: 'calendar_event', summary: 'Grüße', date: '2026-02-23' },
    )

    expect(ref).toEqual({
      objectId: 'event-abc',
      url: 'http://store.test/api/v1/objects/event-abc',
    })
    const req = lastRequest()
    expect(req.method).toBe('PUT')
    expect(req.url).toBe('http://store.test/api/v1/objects/event-abc')
    expect(req.body).toEqual({ uid: 'x1', summary: 'Grüße' })
    expect(req.headers.get('content-type')).toBe('application/json')
    expect(req.headers.get('x-metadata')).toBe(
      '{"type":"calendar_event","summary":"Gr\\u00fc\\u00dfe","date":"2026-02-23"}',
    )
    expect(req.headers.has('x-api-token')).toBe(false)
  })

  it('sends the API token when configured', async () => {
    const client = createObjectStoreClient({ baseUrl: 'http://store.test', apiToken: 'test-secret' })
    mockFetch.mockResolvedValueOnce(jsonResponse({}))

    const ref = await client.putObject('event-1', {}, {})

    expect(lastRequest().headers.get('x-api-token')).toBe('test-secret')
    // No object_id in the answer: the requested id stands
    expect(ref.objectId).toBe('event-1')
  })

  it('lists objects with a metadata filter', async () => {
    const client = createObjectStoreClient({ baseUrl: 'http://store.test' })
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        objects: [{ object_id: 'event-1', metadata: { date: '2026-02-23' }, data: { uid: 'x1' } }],
      }),
    )

    const objects = await client.getObjects({
      type: 'calendar_event',
      dateFrom: '2026-01-01',
      dateTo: '2026-12-31',
    })

    expect(lastRequest().url).toBe(
      'http://store.test/api/v1/objects?type=calendar_event&date_from=2026-01-01&date_to=2026-12-31',
    )
    expect(objects).toEqual([
      { objectId: 'event-1', metadata: { date: '2026-02-23' }, data: { uid: 'x1' } },
    ])
  })

  it('maps a network failure to StoreUnavailable', async () => {
    const client = createObjectStoreClient({ baseUrl: 'http://store.test' })
    mockFetch.mockRejectedValueOnce(new Error('ECONNREFUSED'))

    const err = await client.getObject('event-1').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(StoreUnavailable)
    expect(err).toMatchObject({ service: 'objectstore', status: undefined })
    expect(String(err)).toContain('ECONNREFUSED')
  })

  it('maps 5xx to StoreUnavailable', async () => {
    const client = createObjectStoreClient({ baseUrl: 'http://store.test' })
    mockFetch.mockResolvedValueOnce(new Response('upstream down', { status: 503 }))

    await expect(client.getObject('event-1')).rejects.toMatchObject({
      name: 'StoreUnavailable',
      status: 503,
    })
  })

  it('maps other 4xx to StoreRejected with the error detail', async () => {
    const client = createObjectStoreClient({ baseUrl: 'http://store.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'payload too large' }, 413))

    const err = await client.putObject('event-1', {}, {}).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(StoreRejected)
    expect(err).toMatchObject({ status: 413, detail: 'payload too large' })
  })

  it('rejects an unexpected response body', async () => {
    const client = createObjectStoreClient({ baseUrl: 'http://store.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ objects: 'nope' }))

    await expect(client.getObjects({})).rejects.toBeInstanceOf(StoreRejected)
  })
})

// -------------------------------------------------------------------
// Graph layer
// -------------------------------------------------------------------

const yearNodeResponse = {
  node_id: 'n-1',
  class_name: 'Year',
  name: '2026',
  attributes: { year: 2026, event_count: 3 },
}

describe('GraphClient', () => {
  beforeEach(setupMockFetch)
  afterEach(restoreFetch)

  it('registers a schema with a bearer token', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test', token: 'test-secret' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ status: 'ok' }, 201))

    const result = await client.registerSchema({
      className: 'Year',
      attributes: { year: 'int' },
      description: 'Calendar year',
    })

    expect(result).toBe('created')
    const req = lastRequest()
    expect(req.url).toBe('http://graph.test/api/v1/schemas')
    expect(req.method).toBe('POST')
    expect(req.headers.get('authorization')).toBe('Bearer test-secret')
    expect(req.body).toEqual({
      class_name: 'Year',
      parent_class: 'Thing',
      attributes: { year: 'int' },
      description: 'Calendar year',
    })
  })

  it('treats 400 on schema registration as already registered', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'Schema exists' }, 400))

    await expect(
      client.registerSchema({ className: 'Day', attributes: {}, description: '' }),
    ).resolves.toBe('exists')
  })

  it('propagates other schema registration failures', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'Unauthorized' }, 401))

    await expect(
      client.registerSchema({ className: 'Day', attributes: {}, description: '' }),
    ).rejects.toMatchObject({ name: 'StoreRejected', status: 401, detail: 'Unauthorized' })
  })

  it('creates nodes and maps the response', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse(yearNodeResponse, 201))

    const node = await client.createNode('Year', '2026', { year: 2026, event_count: 3 })

    expect(node).toEqual({
      nodeId: 'n-1',
      className: 'Year',
      name: '2026',
      attributes: { year: 2026, event_count: 3 },
    })
    expect(lastRequest().body).toEqual({
      class_name: 'Year',
      name: '2026',
      attributes: { year: 2026, event_count: 3 },
    })
  })

  it('updates nodes with PUT', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse(yearNodeResponse))

    await client.updateNode('n-1', '2026', { event_count: 3 })

    const req = lastRequest()
    expect(req.method).toBe('PUT')
    expect(req.url).toBe('http://graph.test/api/v1/nodes/n-1')
    expect(req.body).toEqual({ name: '2026', attributes: { event_count: 3 } })
  })

  it('creates edges', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ edge_id: 'e-1', from_node_id: 'n-1', to_node_id: 'n-2', edge_type: 'contains_month' }),
    )

    const edge = await client.createEdge('n-1', 'n-2', 'contains_month')

    expect(edge).toEqual({ edgeId: 'e-1', fromNodeId: 'n-1', toNodeId: 'n-2', edgeType: 'contains_month' })
    expect(lastRequest().body).toEqual({
      from_node_id: 'n-1',
      to_node_id: 'n-2',
      edge_type: 'contains_month',
      attributes: {},
    })
  })

  it('deletes an edge and accepts the empty 204 reply', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }))

    await expect(client.deleteEdge('e-1')).resolves.toBeUndefined()

    const req = lastRequest()
    expect(req.method).toBe('DELETE')
    expect(req.url).toBe('http://graph.test/api/v1/edges/e-1')
  })

  it('lists outgoing edges of one type', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        node_id: 'n-1',
        direction: 'out',
        count: 1,
        edges: [
          {
            edge_id: 'e-7',
            from_node_id: 'n-1',
            to_node_id: 'n-9',
            edge_type: 'has_event',
            attributes: {},
            created_at: '2026-01-01T00:00:00',
          },
        ],
      }),
    )

    const edges = await client.outgoingEdges('n-1', 'has_event')

    expect(lastRequest().url).toBe('http://graph.test/api/v1/nodes/n-1/edges?direction=out&edge_type=has_event')
    expect(edges).toEqual([{ edgeId: 'e-7', fromNodeId: 'n-1', toNodeId: 'n-9', edgeType: 'has_event' }])
  })

  it('filters nodes by class with string-valued AND clauses', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ count: 1, nodes: [yearNodeResponse] }))

    const nodes = await client.findNodes('Year', { year: 2026 })

    expect(nodes.map((n) => n.nodeId)).toEqual(['n-1'])
    const req = lastRequest()
    expect(req.url).toBe('http://graph.test/api/v1/filter/by-class/Year')
    expect(req.body).toEqual({
      filter: { filters: [{ attribute: 'year', operator: '==', value: '2026' }], logic: 'AND' },
    })
  })

  it('sends an empty filter when matching the whole class', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ count: 0, nodes: [] }))

    await client.findNodes('Event')

    expect(lastRequest().body).toEqual({})
  })

  it('returns no nodes for an unknown class', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'Schema not found' }, 404))

    await expect(client.findNodes('Week', { year: 2026 })).resolves.toEqual([])
  })

  it('queries outgoing relations of one type', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test' })
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        related: [
          { node: { ...yearNodeResponse, node_id: 'n-2' }, relationship: 'has_event' },
          { node: { ...yearNodeResponse, node_id: 'n-3' }, relationship: 'contains_day' },
        ],
      }),
    )

    const related = await client.relatedNodes('n-1', 'has_event')

    expect(lastRequest().url).toBe(
      'http://graph.test/api/v1/query/related/n-1?direction=outgoing&relationship_type=has_event',
    )
    expect(related.map((r) => r.node.nodeId)).toEqual(['n-2'])
  })

  it('maps a timeout to StoreUnavailable', async () => {
    const client = createGraphClient({ baseUrl: 'http://graph.test', timeoutMs: 5 })
    mockFetch.mockRejectedValueOnce(new DOMException('The operation was aborted', 'TimeoutError'))

    await expect(client.findNodes('Year')).rejects.toMatchObject({
      name: 'StoreUnavailable',
      service: 'graphlayer',
    })
  })
})
