/**
 * Role resolution for workflow interfaces.
 *
 * Every declared method is mapped once to its role and resolved name. The
 * resulting descriptor is immutable and cached per interface object for the
 * life of the process, so the router never inspects markers per call.
 */

import {
  AmbiguousRoleError,
  DuplicateMethodNameError,
  MultipleWorkflowMethodsError,
} from "../errors";
import type { ReturnSpec } from "../returns";
import type { MethodRole, WorkflowOptions } from "../types";
import type { MethodMap, WorkflowInterface } from "./define";
import { isRoleMarker, roleOf, type RoleMarker } from "./markers";
import { mergeWorkflowOptions, optionsFromMarkers } from "./options";

// =============================================================================
// Types
// =============================================================================

type ResolvedMethodBase = {
  /** Method identifier on the interface. */
  readonly method: string;
  /** Workflow type, signal name or query name. */
  readonly name: string;
  readonly returns: ReturnSpec<unknown>;
};

export type ResolvedWorkflowMethod = ResolvedMethodBase & {
  readonly role: "workflow";
  /** Interface defaults merged with the method's option markers. */
  readonly options: Readonly<WorkflowOptions>;
};

export type ResolvedSignalMethod = ResolvedMethodBase & { readonly role: "signal" };

export type ResolvedQueryMethod = ResolvedMethodBase & { readonly role: "query" };

export type ResolvedMethod = ResolvedWorkflowMethod | ResolvedSignalMethod | ResolvedQueryMethod;

/**
 * Immutable role table for one workflow interface.
 */
export interface InterfaceDescriptor {
  readonly interfaceName: string;
  /** Every declared method, including role-less ones. */
  readonly declared: ReadonlySet<string>;
  /** Methods carrying exactly one role. */
  readonly methods: ReadonlyMap<string, ResolvedMethod>;
  /** The entry point, when the interface has one. */
  readonly workflowMethod: ResolvedWorkflowMethod | undefined;
}

// =============================================================================
// Resolution
// =============================================================================

const descriptors = new WeakMap<WorkflowInterface, InterfaceDescriptor>();

/**
 * Resolve (or fetch the cached) descriptor of a workflow interface.
 *
 * @throws AmbiguousRoleError when a method carries more than one role marker
 * @throws MultipleWorkflowMethodsError when more than one method is a workflow method
 * @throws DuplicateMethodNameError when two methods of one role share a name
 */
export function resolveInterface<M extends MethodMap>(
  iface: WorkflowInterface<M>
): InterfaceDescriptor {
  const cached = descriptors.get(iface);
  if (cached) return cached;

  const descriptor = buildDescriptor(iface);
  // Resolution is synchronous, so the first caller always wins.
  descriptors.set(iface, descriptor);
  return descriptor;
}

function resolveName(method: string, marker: RoleMarker): string {
  const explicit = marker.type === "workflow" ? marker.options.name : marker.name;
  return explicit !== undefined && explicit.length > 0 ? explicit : method;
}

function buildDescriptor(iface: WorkflowInterface): InterfaceDescriptor {
  const interfaceName = iface.name;
  const methods = new Map<string, ResolvedMethod>();
  const namesByRole: Record<MethodRole, Map<string, string>> = {
    workflow: new Map(),
    signal: new Map(),
    query: new Map(),
  };
  const workflowMethods: ResolvedWorkflowMethod[] = [];

  for (const [method, definition] of Object.entries(iface.methods)) {
    const roleMarkers = definition.markers.filter(isRoleMarker);
    if (roleMarkers.length > 1) {
      throw new AmbiguousRoleError({
        interfaceName,
        method,
        roles: roleMarkers.map(roleOf),
      });
    }
    const marker = roleMarkers[0];
    if (!marker) continue;

    const name = resolveName(method, marker);
    const seen = namesByRole[marker.type];
    const owner = seen.get(name);
    if (owner !== undefined) {
      throw new DuplicateMethodNameError({
        interfaceName,
        role: marker.type,
        name,
        methods: [owner, method],
      });
    }
    seen.set(name, method);

    const base = { method, name, returns: definition.returns };
    switch (marker.type) {
      case "workflow": {
        const resolved: ResolvedWorkflowMethod = Object.freeze({
          ...base,
          role: "workflow" as const,
          options: mergeWorkflowOptions(iface.defaults, optionsFromMarkers(definition.markers)),
        });
        workflowMethods.push(resolved);
        methods.set(method, resolved);
        break;
      }
      case "signal":
        methods.set(method, Object.freeze({ ...base, role: "signal" as const }));
        break;
      case "query":
        methods.set(method, Object.freeze({ ...base, role: "query" as const }));
        break;
      default: {
        const _exhaustive: never = marker;
        throw new Error(`Unknown role marker: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  if (workflowMethods.length > 1) {
    throw new MultipleWorkflowMethodsError({
      interfaceName,
      methods: workflowMethods.map((m) => m.method),
    });
  }

  return Object.freeze({
    interfaceName,
    declared: new Set(Object.keys(iface.methods)),
    methods,
    workflowMethod: workflowMethods[0],
  });
}
