export * from './browser/selectors'
export * from './browser/normalize'
export { resolve, resolveAll } from './browser/resolver'
export type { ResolvedElement } from './browser/resolver'
export type { ElementRef, PageDriver } from './browser/driver'
export { BrowserSession, SessionTerminatedError, SessionUnavailableError } from './browser/session'
export type { SessionState } from './browser/session'
export { ActionExecutor } from './browser/actions'
export type { ActionOutcome, ActionOptions, ExecutorSettings } from './browser/actions'
export { BrowserManager } from './browser/manager'
export type { SessionLauncher } from './browser/manager'
export { PlaywrightDriver } from './browser/playwright-driver'
export { PageStateDetector, isIrreversibleCheckout } from './state/detector'
export { StopGuard } from './policy/guard'
export { formatVerdict } from './policy/types'
export type { StopGuardVerdict, StopGuardConfig } from './policy/types'
export { HumanGate, ConsoleResumeChannel, ManualResumeChannel } from './gate/human-gate'
export type { HumanGateRequest, ResumeChannel } from './gate/human-gate'
export { MemoryPaymentRecords } from './records/payments'
export type { PaymentRecords, Authorization } from './records/payments'
export { ToolRegistry, STOPPED_ON_CHECKOUT } from './agent/registry'
export type { ToolDefinition, ToolParam, ToolArgs } from './agent/registry'
export { createToolContext } from './agent/context'
export type { ToolContext } from './agent/context'
export { runLoop } from './agent/loop'
export type { AgentStep, Planner, PlannerDecision, LoopResult, LoopOutcome } from './agent/loop'
export { ScriptedPlanner } from './agent/planner'
export { TaskRuntime } from './agent/runtime'
export { TASKS, TASK_NAMES } from './agent/tasks'
export type { TaskDefinition, TaskName, TaskInput } from './agent/tasks'
export { resolveConfig } from './daemon/config'
export type { StepwardenConfig } from './daemon/config'
export { createLogger } from './audit/log'
export { AuditLogger } from './audit/logger'
