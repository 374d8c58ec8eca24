// Component Registry - maps configured identifiers to component factories
import { Component, ComponentOptions, ComponentSpec, Input, Output, Service, StatusNotifier } from '../interfaces';
import { toError } from './ErrorHandler';

export type ComponentKind = 'input' | 'output' | 'service';

export type ComponentFactory<T extends Component> = (
  notifier: StatusNotifier,
  options: ComponentOptions
) => T;

export class ComponentRegistry {
  private inputs: Map<string, ComponentFactory<Input>> = new Map();
  private outputs: Map<string, ComponentFactory<Output>> = new Map();
  private services: Map<string, ComponentFactory<Service>> = new Map();

  public registerInput(id: string, factory: ComponentFactory<Input>): this {
    ComponentRegistry.register(this.inputs, 'input', id, factory);
    return this;
  }

  public registerOutput(id: string, factory: ComponentFactory<Output>): this {
    ComponentRegistry.register(this.outputs, 'output', id, factory);
    return this;
  }

  public registerService(id: string, factory: ComponentFactory<Service>): this {
    ComponentRegistry.register(this.services, 'service', id, factory);
    return this;
  }

  public createInput(spec: ComponentSpec, notifier: StatusNotifier): Input {
    return ComponentRegistry.create(this.inputs, 'input', spec, notifier);
  }

  public createOutput(spec: ComponentSpec, notifier: StatusNotifier): Output {
    return ComponentRegistry.create(this.outputs, 'output', spec, notifier);
  }

  public createService(spec: ComponentSpec, notifier: StatusNotifier): Service {
    return ComponentRegistry.create(this.services, 'service', spec, notifier);
  }

  public has(kind: ComponentKind, id: string): boolean {
    return this.factoriesFor(kind).has(id);
  }

  public list(kind: ComponentKind): string[] {
    return Array.from(this.factoriesFor(kind).keys());
  }

  private factoriesFor(kind: ComponentKind): ReadonlyMap<string, unknown> {
    switch (kind) {
      case 'input':
        return this.inputs;
      case 'output':
        return this.outputs;
      case 'service':
        return this.services;
    }
  }

  private static register<T extends Component>(
    factories: Map<string, ComponentFactory<T>>,
    kind: ComponentKind,
    id: string,
    factory: ComponentFactory<T>
  ): void {
    if (factories.has(id)) {
      throw new Error(`Duplicate ${kind} component "${id}"`);
    }
    factories.set(id, factory);
  }

  private static create<T extends Component>(
    factories: Map<string, ComponentFactory<T>>,
    kind: ComponentKind,
    [id, options]: ComponentSpec,
    notifier: StatusNotifier
  ): T {
    const factory = factories.get(id);
    try {
      if (!factory) {
        throw new Error(`no ${kind} component is registered under that name`);
      }
      return factory(notifier, options ?? {});
    } catch (error) {
      throw new Error(
        `Failed to load component ${id} with options ${JSON.stringify(options)}: ${toError(error).message}`
      );
    }
  }
}
