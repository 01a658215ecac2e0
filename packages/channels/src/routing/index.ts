export {
  AuthorizationRouter,
  DirectModeStrategy,
  ContainerModeStrategy,
  createRouter,
  containerTarget,
  samePeer,
  type RouteDecision,
  type RejectReason,
  type RouterOptions,
  type RoutingStrategy,
} from './router.js';
