export { applyManifests, type ApplyManifestsParams, type ApplyManifestsResult } from './tool';
