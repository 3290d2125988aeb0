export { createContainer, type Deps, type DepsOverrides } from './container';
