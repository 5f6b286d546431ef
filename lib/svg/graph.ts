export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type Point = readonly [number, number];

export type NodeRole = 'node' | 'boundary' | 'label';

export interface EndpointMatch {
  method: 'id' | 'geometric';
  confidence: number;                // id ≥ 0.9, geometric < 0.9
}

export interface StructuralNode {
  id: string;
  element_type: 'node' | 'label';
  selector: string;
  label: string;
  center: Point;
  bounds: Bounds;
  role: NodeRole;
  zone?: string;
  animatable_selector?: string;
  text_selector?: string;
  parent_id?: string;
  attributes: Record<string, string>;
}

export interface StructuralEdge {
  id: string;
  element_type: 'edge';
  selector: string;
  /** Unresolved endpoints stay null: callers treat them as unknown, never as absent. */
  source_id: string | null;
  target_id: string | null;
  source_match?: EndpointMatch;
  target_match?: EndpointMatch;
  edge_type: string;
  animatable_selector: string;
  label: string;
  center: Point;
  bounds: Bounds;
  attributes: Record<string, string>;
}

export interface StructuralGroup {
  id: string;
  element_type: 'boundary';
  selector: string;
  label: string;
  center: Point;
  bounds: Bounds;
  member_ids: string[];
  attributes: Record<string, string>;
}

export type StructuralElement = StructuralNode | StructuralEdge | StructuralGroup;

export interface StructuralGraph {
  svg_id: string;
  diagram_type: string;
  width: number;
  height: number;
  viewbox: string;
  nodes: StructuralNode[];
  edges: StructuralEdge[];
  groups: StructuralGroup[];
  element_index: Record<string, StructuralElement>;
  /** Element ids carried by more than one element, in document order. */
  duplicate_ids: string[];
}

export type DifferenceType =
  | 'nodes_added'
  | 'nodes_removed'
  | 'edges_added'
  | 'edges_removed'
  | 'edge_reconnected'
  | 'group_membership_changed';

export interface StructureDifference {
  type: DifferenceType;
  severity: 'error' | 'warning';
  ids: string[];
  message: string;
}

export interface StructureStats {
  nodes: number;
  edges: number;
  groups: number;
}

export interface StructureComparison {
  is_equivalent: boolean;
  differences: StructureDifference[];
  original_stats: StructureStats;
  modified_stats: StructureStats;
}
