export * from "./visitor.js";
export {
  ArenaTree,
  isNodeKind,
  type ArenaNode,
  type CddlNode,
  type CddlNodeOf,
  type NodeKind,
  type NodeKindMap,
} from "./arena.js";
export {
  PARENT_KINDS,
  ParentIndex,
  ParentVisitor,
  buildParentIndex,
  describeNode,
  type ParentIndexEntry,
  type ParentKind,
} from "./parent-index.js";
