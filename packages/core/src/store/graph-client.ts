/**
 * Graph Layer Client
 *
 * Implements GraphLayer against the graph service REST API
 * (schemas, nodes, edges, class filters, related-node queries).
 */

import { z } from 'zod'
import { StoreRejected } from '../errors.js'
import { requestJson } from './http.js'
import type { HttpClientConfig } from './http.js'
import type {
  Attributes,
  EdgeType,
  GraphEdge,
  GraphLayer,
  GraphNode,
  NodeClass,
  RelatedNode,
  SchemaDefinition,
} from './types.js'

export const DEFAULT_GRAPH_LAYER_URL = 'http://localhost:5001'

const nodeSchema = z.object({
  node_id: z.string(),
  class_name: z.string(),
  name: z.string(),
  attributes: z.record(z.unknown()).default({}),
})

const edgeSchema = z.object({
  edge_id: z.string(),
  from_node_id: z.string(),
  to_node_id: z.string(),
  edge_type: z.string(),
})

const edgeListSchema = z.object({
  edges: z.array(edgeSchema),
})

const nodeListSchema = z.object({
  nodes: z.array(nodeSchema),
})

const relatedSchema = z.object({
  related: z.array(
    z.object({
      node: nodeSchema,
      relationship: z.string(),
    }),
  ),
})

type NodeResponse = z.infer<typeof nodeSchema>
type EdgeResponse = z.infer<typeof edgeSchema>

function toGraphNode(node: NodeResponse): GraphNode {
  return {
    nodeId: node.node_id,
    className: node.class_name,
    name: node.name,
    attributes: node.attributes,
  }
}

function toGraphEdge(edge: EdgeResponse): GraphEdge {
  return {
    edgeId: edge.edge_id,
    fromNodeId: edge.from_node_id,
    toNodeId: edge.to_node_id,
    edgeType: edge.edge_type,
  }
}

export interface GraphClientConfig {
  baseUrl?: string
  /** Bearer token */
  token?: string
  timeoutMs?: number
}

export class GraphClient implements GraphLayer {
  private readonly http: HttpClientConfig

  constructor(config: GraphClientConfig = {}) {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (config.token) {
      headers.Authorization = `Bearer ${config.token}`
    }
    this.http = {
      service: 'graphlayer',
      baseUrl: `${(config.baseUrl ?? DEFAULT_GRAPH_LAYER_URL).replace(/\/+$/, '')}/api/v1`,
      headers,
      timeoutMs: config.timeoutMs,
    }
  }

  async registerSchema(schema: SchemaDefinition): Promise<'created' | 'exists'> {
    try {
      await requestJson(this.http, {
        method: 'POST',
        path: '/schemas',
        body: JSON.stringify({
          class_name: schema.className,
          parent_class: schema.parentClass ?? 'Thing',
          attributes: schema.attributes,
          description: schema.description,
        }),
        schema: z.unknown(),
      })
      return 'created'
    } catch (err) {
      // The service answers 400 for an already registered class
      if (err instanceof StoreRejected && (err.status === 400 || err.status === 409)) {
        return 'exists'
      }
      throw err
    }
  }

  async createNode(className: NodeClass, name: string, attributes: Attributes): Promise<GraphNode> {
    const node = await requestJson(this.http, {
      method: 'POST',
      path: '/nodes',
      body: JSON.stringify({ class_name: className, name, attributes }),
      schema: nodeSchema,
    })
    return toGraphNode(node)
  }

  async updateNode(nodeId: string, name: string, attributes: Attributes): Promise<GraphNode> {
    const node = await requestJson(this.http, {
      method: 'PUT',
      path: `/nodes/${encodeURIComponent(nodeId)}`,
      body: JSON.stringify({ name, attributes }),
      schema: nodeSchema,
    })
    return toGraphNode(node)
  }

  async createEdge(fromNodeId: string, toNodeId: string, edgeType: EdgeType): Promise<GraphEdge> {
    const edge = await requestJson(this.http, {
      method: 'POST',
      path: '/edges',
      body: JSON.stringify({
        from_node_id: fromNodeId,
        to_node_id: toNodeId,
        edge_type: edgeType,
        attributes: {},
      }),
      schema: edgeSchema,
    })
    return toGraphEdge(edge)
  }

  async deleteEdge(edgeId: string): Promise<void> {
    await requestJson(this.http, {
      method: 'DELETE',
      path: `/edges/${encodeURIComponent(edgeId)}`,
      schema: z.unknown(),
    })
  }

  async outgoingEdges(nodeId: string, edgeType?: EdgeType): Promise<GraphEdge[]> {
    const result = await requestJson(this.http, {
      method: 'GET',
      path: `/nodes/${encodeURIComponent(nodeId)}/edges`,
      query: { direction: 'out', edge_type: edgeType },
      schema: edgeListSchema,
    })
    return result.edges
      .map(toGraphEdge)
      .filter((edge) => edgeType === undefined || edge.edgeType === edgeType)
  }

  async findNodes(
    className: NodeClass,
    match: Record<string, string | number> = {},
  ): Promise<GraphNode[]> {
    const filters = Object.entries(match).map(([attribute, value]) => ({
      attribute,
      operator: '==',
      value: String(value),
    }))
    const body = filters.length > 0 ? { filter: { filters, logic: 'AND' } } : {}

    try {
      const result = await requestJson(this.http, {
        method: 'POST',
        path: `/filter/by-class/${encodeURIComponent(className)}`,
        body: JSON.stringify(body),
        schema: nodeListSchema,
      })
      return result.nodes.map(toGraphNode)
    } catch (err) {
      // Unknown class: nothing has been imported yet
      if (err instanceof StoreRejected && err.status === 404) {
        return []
      }
      throw err
    }
  }

  async relatedNodes(nodeId: string, relationship?: EdgeType): Promise<RelatedNode[]> {
    const result = await requestJson(this.http, {
      method: 'GET',
      path: `/query/related/${encodeURIComponent(nodeId)}`,
      query: { direction: 'outgoing', relationship_type: relationship },
      schema: relatedSchema,
    })

    return result.related
      .filter((item) => relationship === undefined || item.relationship === relationship)
      .map((item) => ({ node: toGraphNode(item.node), relationship: item.relationship }))
  }
}

export function createGraphClient(config?: GraphClientConfig): GraphClient {
  return new GraphClient(config)
}
