/**
 * Object Store Client
 *
 * Implements ObjectStore against the object store REST API.
 */

import { z } from 'zod'
import { asciiJson, joinUrl, requestJson } from './http.js'
import type { HttpClientConfig } from './http.js'
import type {
  AttributeValue,
  ObjectFilter,
  ObjectStore,
  StoredObject,
  StoredObjectRef,
} from './types.js'

export const DEFAULT_OBJECT_STORE_URL = 'http://localhost:5000'

const putResponseSchema = z.object({
  object_id: z.string().optional(),
})

const listResponseSchema = z.object({
  objects: z.array(
    z.object({
      object_id: z.string(),
      metadata: z.record(z.unknown()).default({}),
      data: z.unknown(),
    }),
  ),
})

export interface ObjectStoreClientConfig {
  baseUrl?: string
  /** Sent as X-API-Token when set */
  apiToken?: string
  timeoutMs?: number
}

export class ObjectStoreClient implements ObjectStore {
  private readonly baseUrl: string
  private readonly http: HttpClientConfig

  constructor(config: ObjectStoreClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_OBJECT_STORE_URL).replace(/\/+$/, '')
    this.http = {
      service: 'objectstore',
      baseUrl: this.baseUrl,
      headers: config.apiToken ? { 'X-API-Token': config.apiToken } : {},
      timeoutMs: config.timeoutMs,
    }
  }

  async putObject(
    objectId: string,
    payload: unknown,
    metadata: Record<string, AttributeValue>,
  ): Promise<StoredObjectRef> {
    const result = await requestJson(this.http, {
      method: 'PUT',
      path: `/api/v1/objects/${encodeURIComponent(objectId)}`,
      body: JSON.stringify(payload, null, 2),
      headers: {
        'Content-Type': 'application/json',
        'X-Metadata': asciiJson(metadata),
      },
      schema: putResponseSchema,
    })

    const storedId = result.object_id ?? objectId
    return { objectId: storedId, url: this.objectUrl(storedId) }
  }

  async getObject(objectId: string): Promise<unknown> {
    return requestJson(this.http, {
      method: 'GET',
      path: `/api/v1/objects/${encodeURIComponent(objectId)}`,
      schema: z.unknown(),
    })
  }

  async getObjects(filter: ObjectFilter): Promise<StoredObject[]> {
    const result = await requestJson(this.http, {
      method: 'GET',
      path: '/api/v1/objects',
      query: {
        type: filter.type,
        date_from: filter.dateFrom,
        date_to: filter.dateTo,
      },
      schema: listResponseSchema,
    })

    return result.objects.map((obj) => ({
      objectId: obj.object_id,
      metadata: obj.metadata,
      data: obj.data,
    }))
  }

  objectUrl(objectId: string): string {
    return joinUrl(this.baseUrl, `/api/v1/objects/${encodeURIComponent(objectId)}`)
  }
}

export function createObjectStoreClient(config?: ObjectStoreClientConfig): ObjectStoreClient {
  return new ObjectStoreClient(config)
}
