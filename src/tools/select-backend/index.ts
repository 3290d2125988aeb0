/**
 * Select Backend Tool
 * Chooses kind or minikube
 */

export { selectBackend } from './tool';
