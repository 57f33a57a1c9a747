// ---------------------------------------------------------------------------
// Shared build domain types.
//
// Definitions are what a build file contains; the resolved types are what the
// runner executes, with every working directory, environment and host path
// made explicit.
// ---------------------------------------------------------------------------

// -- Building blocks --------------------------------------------------------

/** Base image reference, resolved from a registry. */
export type ImageRef = {
  /** Repository name, optionally with registry host (e.g. "archlinux"). */
  name: string;
  tag: string;
}

export type NetworkMode = 'bridge' | 'none'

// -- Resolved types (after loading) -----------------------------------------

type StepBase = {
  id: string;
  /** Human-readable display name. Falls back to `id` when absent. */
  name?: string;
  /** Absolute working directory inside the image. */
  workdir: string;
}

/** Runs a command on top of the previous layer. */
export type RunStep = StepBase & {
  kind: 'run';
  cmd: string[];
  /** Complete environment of the command (nothing is inherited from the host). */
  env: Record<string, string>;
  network: NetworkMode;
  timeoutSec?: number;
}

/** Copies a host directory into the image. */
export type CopyStep = StepBase & {
  kind: 'copy';
  /** Absolute host path. */
  source: string;
  /** Absolute path inside the image. */
  destination: string;
  /** True when `to` names a directory (`.` or a trailing `/`): a file source lands inside it. */
  intoDirectory: boolean;
}

export type Step = RunStep | CopyStep

/** A build whose steps have all been resolved, ready for execution. */
export type BuildPlan = {
  id: string;
  name?: string;
  base: ImageRef;
  /** Labels committed into every layer's image configuration. */
  labels?: Record<string, string>;
  steps: Step[];
}

// -- Definition types (as written in a build file) --------------------------

type StepDefinitionBase = {
  id?: string;
  name?: string;
  workdir?: string;
}

export type RunStepDefinition = StepDefinitionBase & {
  /** Argument vector, or a shell string run through `/bin/sh -c`. */
  run: string[] | string;
  env?: Record<string, string>;
  network?: NetworkMode;
  timeoutSec?: number;
}

export type CopyStepDefinition = StepDefinitionBase & {
  copy: {
    /** Host path relative to the build file directory. */
    from: string;
    /**
     * Absolute, or relative to the step's working directory (default ".").
     * A trailing `/` marks a directory, as in a Dockerfile COPY.
     */
    to?: string;
  };
}

export type StepDefinition = RunStepDefinition | CopyStepDefinition

export type BuildDefinition = {
  id?: string;
  name?: string;
  /** Base image as `name[:tag]`. */
  from: string;
  workdir?: string;
  env?: Record<string, string>;
  labels?: Record<string, string>;
  steps?: StepDefinition[];
}

/** Type guard: returns true when the definition copies files (`copy` field present). */
export function isCopyStep(step: StepDefinition): step is CopyStepDefinition {
  return 'copy' in step && typeof step.copy === 'object' && step.copy !== null
}

export function displayName(step: {id: string; name?: string}): string {
  return step.name ?? step.id
}
