/**
 * Store boundary: capability interfaces, HTTP clients and in-memory fakes.
 */

export type {
  AttributeValue,
  Attributes,
  StoredObjectRef,
  StoredObject,
  ObjectFilter,
  ObjectStore,
  NodeClass,
  EdgeType,
  GraphNode,
  GraphEdge,
  RelatedNode,
  SchemaDefinition,
  GraphLayer,
} from './types.js'

export { requestJson, joinUrl, asciiJson, DEFAULT_REQUEST_TIMEOUT_MS } from './http.js'
export type { HttpClientConfig } from './http.js'
export {
  ObjectStoreClient,
  createObjectStoreClient,
  DEFAULT_OBJECT_STORE_URL,
} from './object-store-client.js'
export type { ObjectStoreClientConfig } from './object-store-client.js'
export { GraphClient, createGraphClient, DEFAULT_GRAPH_LAYER_URL } from './graph-client.js'
export type { GraphClientConfig } from './graph-client.js'
export { InMemoryObjectStore, InMemoryGraphLayer } from './memory.js'
