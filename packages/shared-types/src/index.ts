// packages/shared-types/src/index.ts
//
// Canonical contract types shared by the check engine and its collaborators.
// NO runtime logic: only types and type-level contracts.

/* ------------------------------------------------------------------ */
/*  Primitives                                                         */
/* ------------------------------------------------------------------ */

/** Ascending: success < warning < error < internal_error. */
export type Severity = "success" | "warning" | "error" | "internal_error";

export type GroupResultMode = "all" | "any";

export type Result = {
    severity: Severity;
    reason?: string;
};

export type ReduceMethod = "latest" | "average" | "median" | "sum" | "min" | "max" | "std";

/* ------------------------------------------------------------------ */
/*  Live resources                                                     */
/* ------------------------------------------------------------------ */

/** A live data source (a control point or a device component). */
export type SignalHandle = {
    readonly name: string;
    /** Rejects when the source cannot be reached. */
    connect(timeoutMs: number): Promise<void>;
    /** Resolves to `undefined` or `null` when the source has no value. */
    read(): Promise<unknown>;
    /** Optional monitor; returns the unsubscribe function. */
    subscribe?(listener: (value: unknown) => void): () => void;
};

export type DeviceHandle = {
    readonly name: string;
    readonly components: Readonly<Record<string, SignalHandle | DeviceHandle>>;
};

export type DeviceDatabase = {
    /** Throws (or rejects) for unknown devices and lookup failures. */
    resolve(name: string): DeviceHandle | Promise<DeviceHandle>;
};

export type SignalFactory = (name: string) => SignalHandle;

/* ------------------------------------------------------------------ */
/*  Tools                                                              */
/* ------------------------------------------------------------------ */

export type ToolResult = {
    /** Throws when `key` is absent from the bundle; any thrown error counts as a missing key. */
    lookup(key: string): unknown;
};

export type Tool = {
    readonly type: string;
    /** Throws when `key` can never appear in this tool's results. */
    validateResultKey(key: string): void;
    run(): Promise<ToolResult>;
};

/* ------------------------------------------------------------------ */
/*  Comparisons                                                        */
/* ------------------------------------------------------------------ */

export type Comparison = {
    name?: string;
    description?: string;
    /** Severity reported when the data source is unreachable or empty. */
    if_disconnected: Severity;
    /** Severity reported when a tool result lacks the requested key. */
    severity_on_failure: Severity;
    /** Reduction window in seconds; unset or 0 reads a single value. */
    reduce_period?: number;
    reduce_method?: ReduceMethod;
    string?: boolean;
    evaluate(value: unknown, identifier: string): Result | Promise<Result>;
};

/* ------------------------------------------------------------------ */
/*  Configuration tree                                                 */
/* ------------------------------------------------------------------ */

export type ConfigurationMeta = {
    name?: string;
    description?: string;
    tags?: string[];
};

export type ConfigurationGroup = ConfigurationMeta & {
    type: "group";
    configs: AnyConfiguration[];
    mode: GroupResultMode;
};

/** Checks one or more devices. Attribute keys may be dotted ("sub.component"). */
export type DeviceConfiguration = ConfigurationMeta & {
    type: "device";
    devices: string[];
    by_attr: Record<string, Comparison[]>;
    /** Run against every key of `by_attr`. */
    shared: Comparison[];
};

/** Checks raw control points addressed by name. */
export type PointConfiguration = ConfigurationMeta & {
    type: "point";
    by_point: Record<string, Comparison[]>;
    shared: Comparison[];
};

/** Checks the result bundle of a tool run. */
export type ToolConfiguration = ConfigurationMeta & {
    type: "tool";
    tool: Tool;
    by_attr: Record<string, Comparison[]>;
    shared: Comparison[];
};

export type AnyConfiguration =
    | ConfigurationGroup
    | DeviceConfiguration
    | PointConfiguration
    | ToolConfiguration;

export type ConfigurationFile = {
    version: 0;
    root: ConfigurationGroup;
};
