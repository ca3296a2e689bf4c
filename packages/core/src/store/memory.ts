/**
 * In-memory ObjectStore and GraphLayer.
 *
 * Reproduce the remote services' observable behaviour (uid-addressed
 * overwrite, 400 on a duplicate schema, 404 on unknown nodes, outgoing
 * relations only) without any HTTP.
 */

import { StoreRejected } from '../errors.js'
import type {
  AttributeValue,
  Attributes,
  EdgeType,
  GraphEdge,
  GraphLayer,
  GraphNode,
  NodeClass,
  ObjectFilter,
  ObjectStore,
  RelatedNode,
  SchemaDefinition,
  StoredObject,
  StoredObjectRef,
} from './types.js'

export class InMemoryObjectStore implements ObjectStore {
  private objects = new Map<string, { data: unknown; metadata: Record<string, AttributeValue> }>()

  constructor(private readonly baseUrl = 'memory://objectstore') {}

  async putObject(
    objectId: string,
    payload: unknown,
    metadata: Record<string, AttributeValue>,
  ): Promise<StoredObjectRef> {
    // Serialize like the wire would, so later mutation of payload has no effect
    this.objects.set(objectId, {
      data: JSON.parse(JSON.stringify(payload)),
      metadata: { ...metadata },
    })
    return { objectId, url: this.objectUrl(objectId) }
  }

  async getObject(objectId: string): Promise<unknown> {
    const stored = this.objects.get(objectId)
    if (!stored) {
      throw new StoreRejected('objectstore', `Object not found: ${objectId}`, 404)
    }
    return stored.data
  }

  async getObjects(filter: ObjectFilter): Promise<StoredObject[]> {
    const result: StoredObject[] = []
    for (const [objectId, stored] of this.objects) {
      const { type, date } = stored.metadata
      if (filter.type !== undefined && type !== filter.type) continue
      if (filter.dateFrom !== undefined && (typeof date !== 'string' || date < filter.dateFrom)) {
        continue
      }
      if (filter.dateTo !== undefined && (typeof date !== 'string' || date > filter.dateTo)) {
        continue
      }
      result.push({ objectId, metadata: { ...stored.metadata }, data: stored.data })
    }
    return result
  }

  objectUrl(objectId: string): string {
    return `${this.baseUrl}/api/v1/objects/${encodeURIComponent(objectId)}`
  }

  /** Number of stored objects */
  get size(): number {
    return this.objects.size
  }
}

export class InMemoryGraphLayer implements GraphLayer {
  private schemas = new Set<string>()
  private nodes = new Map<string, GraphNode>()
  private edges: GraphEdge[] = []
  private nextNodeId = 1
  private nextEdgeId = 1

  async registerSchema(schema: SchemaDefinition): Promise<'created' | 'exists'> {
    if (this.schemas.has(schema.className)) return 'exists'
    this.schemas.add(schema.className)
    return 'created'
  }

  async createNode(className: NodeClass, name: string, attributes: Attributes): Promise<GraphNode> {
    if (!this.schemas.has(className)) {
      throw new StoreRejected('graphlayer', `Unknown class: ${className}`, 400)
    }
    const node: GraphNode = {
      nodeId: `node-${this.nextNodeId++}`,
      className,
      name,
      attributes: { ...attributes },
    }
    this.nodes.set(node.nodeId, node)
    return { ...node, attributes: { ...node.attributes } }
  }

  async updateNode(nodeId: string, name: string, attributes: Attributes): Promise<GraphNode> {
    const node = this.nodes.get(nodeId)
    if (!node) {
      throw new StoreRejected('graphlayer', `Node not found: ${nodeId}`, 404)
    }
    node.name = name
    node.attributes = { ...node.attributes, ...attributes }
    return { ...node, attributes: { ...node.attributes } }
  }

  async createEdge(fromNodeId: string, toNodeId: string, edgeType: EdgeType): Promise<GraphEdge> {
    if (!this.nodes.has(fromNodeId) || !this.nodes.has(toNodeId)) {
      throw new StoreRejected('graphlayer', `Edge endpoints must exist`, 400)
    }
    const edge: GraphEdge = { edgeId: `edge-${this.nextEdgeId++}`, fromNodeId, toNodeId, edgeType }
    this.edges.push(edge)
    return { ...edge }
  }

  async deleteEdge(edgeId: string): Promise<void> {
    const index = this.edges.findIndex((edge) => edge.edgeId === edgeId)
    if (index === -1) {
      throw new StoreRejected('graphlayer', `Edge not found: ${edgeId}`, 404)
    }
    this.edges.splice(index, 1)
  }

  async outgoingEdges(nodeId: string, edgeType?: EdgeType): Promise<GraphEdge[]> {
    if (!this.nodes.has(nodeId)) {
      throw new StoreRejected('graphlayer', `Node not found: ${nodeId}`, 404)
    }
    return this.edges
      .filter((edge) => edge.fromNodeId === nodeId)
      .filter((edge) => edgeType === undefined || edge.edgeType === edgeType)
      .map((edge) => ({ ...edge }))
  }

  async findNodes(
    className: NodeClass,
    match: Record<string, string | number> = {},
  ): Promise<GraphNode[]> {
    if (!this.schemas.has(className)) return []
    const result: GraphNode[] = []
    for (const node of this.nodes.values()) {
      if (node.className !== className) continue
      const matches = Object.entries(match).every(
        ([attribute, value]) => String(node.attributes[attribute]) === String(value),
      )
      if (matches) result.push({ ...node, attributes: { ...node.attributes } })
    }
    return result
  }

  async relatedNodes(nodeId: string, relationship?: EdgeType): Promise<RelatedNode[]> {
    if (!this.nodes.has(nodeId)) {
      throw new StoreRejected('graphlayer', `Node not found: ${nodeId}`, 404)
    }
    const result: RelatedNode[] = []
    for (const edge of this.edges) {
      if (edge.fromNodeId !== nodeId) continue
      if (relationship !== undefined && edge.edgeType !== relationship) continue
      const node = this.nodes.get(edge.toNodeId)
      if (node) {
        result.push({
          node: { ...node, attributes: { ...node.attributes } },
          relationship: edge.edgeType,
        })
      }
    }
    return result
  }

  /** All nodes of a class, for assertions */
  nodesOfClass(className: NodeClass): GraphNode[] {
    return Array.from(this.nodes.values()).filter((node) => node.className === className)
  }

  /** All edges, for assertions */
  allEdges(): GraphEdge[] {
    return this.edges.map((edge) => ({ ...edge }))
  }
}
