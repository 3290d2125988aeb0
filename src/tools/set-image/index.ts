export { setImage, type SetImageParams, type SetImageResult } from './tool';
