export { AlphaBetaStrategy } from './alphabeta';
export { NegamaxStrategy } from './negamax';
export { createStrategy, selectAction, parseVariant } from './strategy';
export type { StrategyOptions, SearchStrategy } from './strategy';
export { SearchWindow } from './window';
export { SearchNode, TreeNode } from './node';
export { resolveSearchConfig, DEFAULT_SEARCH_DEPTH } from './config';
export type { SearchConfig, ResolvedSearchConfig } from './config';
