/**
 * Store Boundary Types
 *
 * Capability interfaces for the two external services. The importer and the
 * query engine only talk to these, so both run unchanged against the HTTP
 * clients or the in-memory fakes.
 */

export type AttributeValue = string | number | boolean | null

export type Attributes = Record<string, AttributeValue>

export interface StoredObjectRef {
  objectId: string
  /** <base>/api/v1/objects/<id> */
  url: string
}

export interface StoredObject {
  objectId: string
  metadata: Record<string, unknown>
  data: unknown
}

/**
 * Metadata filter for listing objects. Dates are yyyy-MM-dd, inclusive.
 */
export interface ObjectFilter {
  type?: string
  dateFrom?: string
  dateTo?: string
}

export interface ObjectStore {
  /**
   * Store a JSON document under a caller-chosen id. Writing the same id
   * twice replaces the document.
   */
  putObject(
    objectId: string,
    payload: unknown,
    metadata: Record<string, AttributeValue>,
  ): Promise<StoredObjectRef>

  getObject(objectId: string): Promise<unknown>

  getObjects(filter: ObjectFilter): Promise<StoredObject[]>

  objectUrl(objectId: string): string
}

export type NodeClass = 'Year' | 'Month' | 'Week' | 'Day' | 'Event'

export type EdgeType = 'contains_month' | 'contains_week' | 'contains_day' | 'has_event'

export interface GraphNode {
  nodeId: string
  className: string
  name: string
  attributes: Record<string, unknown>
}

export interface GraphEdge {
  edgeId: string
  fromNodeId: string
  toNodeId: string
  edgeType: string
}

export interface RelatedNode {
  node: GraphNode
  relationship: string
}

export interface SchemaDefinition {
  className: NodeClass
  parentClass?: string
  /** attribute name → type name ("int", "string") */
  attributes: Record<string, string>
  description: string
}

export interface GraphLayer {
  /** Registering an existing class is not an error */
  registerSchema(schema: SchemaDefinition): Promise<'created' | 'exists'>

  createNode(className: NodeClass, name: string, attributes: Attributes): Promise<GraphNode>

  updateNode(nodeId: string, name: string, attributes: Attributes): Promise<GraphNode>

  createEdge(fromNodeId: string, toNodeId: string, edgeType: EdgeType): Promise<GraphEdge>

  deleteEdge(edgeId: string): Promise<void>

  /** Edges leaving a node, optionally of one type */
  outgoingEdges(nodeId: string, edgeType?: EdgeType): Promise<GraphEdge[]>

  /**
   * Nodes of a class whose attributes equal every entry of `match`
   * (compared as strings). An empty match returns the whole class.
   */
  findNodes(className: NodeClass, match?: Record<string, string | number>): Promise<GraphNode[]>

  /** Outgoing neighbours, optionally restricted to one edge type */
  relatedNodes(nodeId: string, relationship?: EdgeType): Promise<RelatedNode[]>
}
