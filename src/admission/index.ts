export { AdmissionController } from './controller.js';
export type { AdmissionControllerDeps, AdmissionInput, AdmissionResult } from './controller.js';
export { RequestLifecycle, canTransition } from './lifecycle.js';
export type { LifecycleState } from './lifecycle.js';
export { ChatRequestSchema, ChatMessageSchema, parseBearerToken, parseChatRequest } from './request.js';
