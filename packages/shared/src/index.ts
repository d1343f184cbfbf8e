// Shared types between the hub backend and its clients

export type ResourceType = 'table' | 'chart' | 'ml' | 'schema'

export interface ResourceSummary {
  uri: string
  name: string
  description: string
  mimeType: string
}

export interface SearchResultItem {
  uri: string
  name: string
  description: string
  tags: string[]
  category: string
  type: string
  created_at: string
  access_count: number
  last_accessed: string | null
}

export interface SearchCriteriaEcho {
  query?: string
  tags?: string[]
  any_tags?: string[]
  category?: string
  resource_type?: string
  created_after?: string
  created_before?: string
  min_access_count?: number
}

// API Request/Response types

export interface HealthResponse {
  status: 'ok'
  service: string
  resources: number
}

export interface ErrorResponse {
  error: string
  type?: string
}

export interface ListResourcesResponse {
  resources: ResourceSummary[]
}

export interface ReadResourceResponse {
  uri: string
  mimeType: string
  text: string
}

export interface StoreResourceResponse {
  uri: string
  type: ResourceType
}

export interface DeleteResourceResponse {
  uri: string
  deleted: boolean
}

export interface SearchResourcesResponse {
  results: SearchResultItem[]
  total_count: number
  search_criteria: SearchCriteriaEcho
  status: 'completed' | 'failed'
  error?: string
}
