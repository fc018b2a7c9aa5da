// File: src/web/DashboardEvents.ts (relative to project root)
import { EventEmitter } from 'events';
import type { AllocationInstance, AllocationMatrix, TransferRuleName } from '../core/types';
import type { StepRecord } from '../core/ImprovementLoop';

export interface RunStartedEvent {
  runId: string;
  instance: AllocationInstance;
  transferRule: TransferRuleName;
  stepSize: number;
}

export interface StepAppliedEvent extends StepRecord {
  runId: string;
  timestamp: number;
}

export interface RunCompletedEvent {
  runId: string;
  efficient: boolean;
  steps: number;
  allocations: AllocationMatrix;
  finalUtilities: number[];
}

/**
 * Singleton event emitter for dashboard communication
 */
class DashboardEventEmitter extends EventEmitter {
  private static instance: DashboardEventEmitter;

  private constructor() {
    super();
    this.setMaxListeners(20);
  }

  private lastRunStarted: RunStartedEvent | null = null;

  public static getInstance(): DashboardEventEmitter {
    if (!DashboardEventEmitter.instance) {
      DashboardEventEmitter.instance = new DashboardEventEmitter();
    }
    return DashboardEventEmitter.instance;
  }

  // Typed event emitters
  emitRunStarted(data: RunStartedEvent): void {
    const fn = "emitRunStarted";
    console.log("src/web/DashboardEvents.ts:%s - emitting run started %s (%s)", fn, data.runId, data.instance.name ?? "unnamed");
    this.lastRunStarted = data;
    this.emit('runStarted', data);
  }

  getLastRunStarted(): RunStartedEvent | null {
    return this.lastRunStarted;
  }

  emitStepApplied(data: StepAppliedEvent): void {
    this.emit('stepApplied', data);
  }

  emitRunCompleted(data: RunCompletedEvent): void {
    const fn = "emitRunCompleted";
    console.log("src/web/DashboardEvents.ts:%s - emitting run %s completed after %d steps", fn, data.runId, data.steps);
    this.emit('runCompleted', data);
  }

  // Typed event listeners
  onRunStarted(listener: (data: RunStartedEvent) => void): void {
    this.on('runStarted', listener);
  }

  onStepApplied(listener: (data: StepAppliedEvent) => void): void {
    this.on('stepApplied', listener);
  }

  onRunCompleted(listener: (data: RunCompletedEvent) => void): void {
    this.on('runCompleted', listener);
  }
}

export const dashboardEvents = DashboardEventEmitter.getInstance();
