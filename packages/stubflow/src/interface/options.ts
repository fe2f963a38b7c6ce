/**
 * Effective workflow options.
 *
 * Precedence, highest first: options passed when a stub is created,
 * method-level markers on the workflow method, interface defaults.
 * A key set to `undefined` never overrides a lower layer.
 */

import type { WorkflowOptions } from "../types";
import type { MethodMarker } from "./markers";

function defined(options: WorkflowOptions): WorkflowOptions {
  const result: WorkflowOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(result, { [key]: value });
  }
  return result;
}

/**
 * Merge option layers, lowest precedence first.
 */
export function mergeWorkflowOptions(
  ...layers: ReadonlyArray<WorkflowOptions | undefined>
): Readonly<WorkflowOptions> {
  const merged: WorkflowOptions = {};
  for (const layer of layers) {
    if (layer) Object.assign(merged, defined(layer));
  }
  return Object.freeze(merged);
}

/**
 * Options declared by a workflow method's markers.
 */
export function optionsFromMarkers(markers: readonly MethodMarker[]): WorkflowOptions {
  const options: WorkflowOptions = {};
  for (const marker of markers) {
    switch (marker.type) {
      case "workflow": {
        const { name: _name, ...methodDefaults } = marker.options;
        Object.assign(options, defined(methodDefaults));
        break;
      }
      case "retry":
        options.retry = marker.retry;
        break;
      case "cron":
        options.cronSchedule = marker.schedule;
        break;
      case "signal":
      case "query":
        break;
      default: {
        const _exhaustive: never = marker;
        throw new Error(`Unknown marker: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }
  return options;
}
