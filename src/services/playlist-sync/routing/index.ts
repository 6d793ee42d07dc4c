export {
  createTrackEvaluators,
  describeFilterAttributes,
  type FilterAttributeDescription,
  findEvaluator,
} from './evaluator-registry.js'
export {
  compileChildFilter,
  routeTracks,
  type TrackMatcher,
} from './track-router.js'
