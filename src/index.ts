export { bigints, integers } from './utils/algorithms/between'
export type { IndexSpace } from './utils/algorithms/between'
export { InvalidBoundsError } from './utils/algorithms/errors'
export { binarySearch, Direction, searchIn } from './utils/algorithms/search'
export type {
    Classifier,
    Endpoint,
    HighDirection,
    LowDirection,
    SearchOptions,
    SearchResult,
} from './utils/algorithms/search'
