export { ResearchWorkflow, taskInput, type ResearchWorkflowDeps } from "./researchWorkflow.js";
export { createApiServer, type ApiServerOptions } from "./apiServer.js";
export { PhaseStateMachine, parseMutation, type PhaseStateMachineDeps } from "./phaseStateMachine.js";
export { evaluateGate, type GateDecision } from "./gateEvaluator.js";
export {
  DEFAULT_WORKFLOW,
  loadWorkflowDefinition,
  parseWorkflowDefinition,
  type WorkflowDefinition,
  type TransitionEdge,
} from "./workflowDefinition.js";
export * from "./sessionState.js";
export { PgSessionStore, type SessionStore } from "./sessionStore.js";
export { PgInFlightIndex, type InFlightIndex, type Lane } from "./inFlightIndex.js";
export { TaskDispatcher, deriveIdempotencyKey, type SubmitRequest, type SubmitAccepted } from "./taskDispatcher.js";
export { AgentTaskRunner, type AgentTaskResult } from "./agentRunner.js";
export { ResultReconciler, type ReconcileOutcome } from "./resultReconciler.js";
export { TaskLedger, type TaskStatus } from "./taskLedger.js";
export {
  DeliveryRouter,
  snapshotMessage,
  type DeliveryMessage,
  type DeliveryPublisher,
  type StateMessage,
  type StreamMessage,
  type Subscription,
} from "./deliveryRouter.js";
export { NatsDeliveryPublisher, startDeliveryRelay, parseDeliveryMessage } from "./deliveryRelay.js";
export { FileRoleConfigSource, StaticRoleConfigSource, type AgentRoleConfig, type RoleConfigSource } from "./agentRoles.js";
export * from "./errors.js";
