export { Success, Failure, type Result } from './result';
export * from './deployment';
