// file: src/types/graph.ts

export type Scalar = string | number | boolean;
export type PropertyValue = Scalar | Scalar[] | null;
export type NodeProperties = { [key: string]: PropertyValue };

/** Węzeł tak, jak zwraca go magazyn. `id` jest nieprzezroczysty i nie wychodzi poza silnik. */
export type GraphNode = {
  id: string;
  labels: string[];
  properties: NodeProperties;
};

/** Rekord węzła w wynikach: spłaszczone właściwości + zawsze `name` i `labels`. */
export type ConceptNode = {
  [key: string]: PropertyValue;
  name: string;
  labels: string[];
};

export type SearchResult = { count: number; results: ConceptNode[] };

export type NodeDetails = { node: ConceptNode | null };

export type ContextResult = {
  node: ConceptNode | null;
  connectedNodes: ConceptNode[];
  relationshipTypes: string[];
};

export type RelatedNodesResult = {
  node: ConceptNode | null;
  relatedNodes: ConceptNode[];
  relationshipTypes: string[];
};

export type TopicWithSubtopics = {
  topic: ConceptNode | null;
  subtopics: ConceptNode[];
  subtopicCount: number;
};

export type PrerequisitesResult = {
  node: ConceptNode | null;
  prerequisites: ConceptNode[];
  prerequisiteCount: number;
};

export type DependentsResult = {
  node: ConceptNode | null;
  dependents: ConceptNode[];
  dependentCount: number;
};

export type LearningPathStatus = 'found' | 'not_found' | 'no_path';

export type LearningPathResult =
  | {
      status: 'found';
      path: ConceptNode[];
      pathLength: number;
      startNode: ConceptNode;
      endNode: ConceptNode;
      message: string;
    }
  | {
      status: 'no_path';
      path: [];
      pathLength: 0;
      startNode: ConceptNode;
      endNode: ConceptNode;
      message: string;
    }
  | {
      status: 'not_found';
      path: [];
      pathLength: 0;
      startNode: ConceptNode | null;
      endNode: ConceptNode | null;
      message: string;
    };

export type SimilarByDifficultyResult = {
  node: ConceptNode | null;
  difficultyLevel: PropertyValue;
  similarNodes: ConceptNode[];
  similarCount: number;
};
