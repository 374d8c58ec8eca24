// Logging Notifier - observes component status transitions
import { EventEmitter } from 'events';
import { Component, Status, StatusNotifier } from '../interfaces';

export interface ComponentStatusEntry {
  id: string;
  name: string;
  status: Status;
  since: Date;
}

export interface StatusChangeEvent {
  component: Component;
  status: Status;
  previous: Status | null;
  timestamp: Date;
}

export class LoggingNotifier extends EventEmitter implements StatusNotifier {
  private entries: Map<Component, ComponentStatusEntry> = new Map();

  constructor() {
    super();
  }

  public update(component: Component, status: Status): void {
    const timestamp = new Date();
    const previous = this.entries.get(component)?.status ?? null;

    this.entries.set(component, {
      id: component.id,
      name: component.name,
      status,
      since: timestamp
    });

    console.log(`Component ${component.name} is now <${status}>`);

    // Observers must never break the component which reported the change
    try {
      const event: StatusChangeEvent = { component, status, previous, timestamp };
      this.emit('status_change', event);
    } catch (error) {
      console.error(`Status listener failed for ${component.name}:`, error);
    }
  }

  public getStatus(component: Component): Status | null {
    return this.entries.get(component)?.status ?? null;
  }

  public getStatuses(): ComponentStatusEntry[] {
    return Array.from(this.entries.values()).map(entry => ({ ...entry }));
  }

  public isBusy(): boolean {
    for (const entry of this.entries.values()) {
      if (entry.status === Status.ACTIVE || entry.status === Status.WORKING) {
        return true;
      }
    }
    return false;
  }
}
