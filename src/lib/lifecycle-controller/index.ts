export * from './types';
export * from './errors';
export * from './config';
export * from './events';
export * from './status';
export * from './host-invokers';
export { canTransition, RoleStateMachine } from './role-state';
export { RoleGuard, type ReleaseGuard } from './role-guard';
export { LifecycleController, type LifecycleControllerOptions } from './lifecycle-controller';
