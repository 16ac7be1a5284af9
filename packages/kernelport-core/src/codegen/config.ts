import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const BuiltinMappingSchema = Type.Union([
  Type.Object(
    {
      attribute: Type.String({ minLength: 1, description: "WGSL @builtin attribute" }),
      type: Type.String({ minLength: 1, description: "WGSL parameter type" }),
    },
    { additionalProperties: false },
  ),
  Type.Object(
    {
      unresolved: Type.String({ description: "Why the builtin has no WGSL equivalent" }),
    },
    { additionalProperties: false },
  ),
]);

/** Schema of a translator config file; every section is optional */
export const TranslatorConfigSchema = Type.Object(
  {
    typeMap: Type.Optional(
      Type.Record(Type.String(), Type.String({ minLength: 1 }), {
        description: "Source scalar type -> WGSL scalar type",
      }),
    ),
    builtins: Type.Optional(
      Type.Record(Type.String(), BuiltinMappingSchema, {
        description: "Source builtin variable -> WGSL entry-point builtin",
      }),
    ),
    functionMap: Type.Optional(
      Type.Record(Type.String(), Type.String({ minLength: 1 }), {
        description: "Source function name -> WGSL function name",
      }),
    ),
  },
  { additionalProperties: false },
);

export type BuiltinMapping = Static<typeof BuiltinMappingSchema>;
export type TranslatorConfigInput = Static<typeof TranslatorConfigSchema>;

export interface TranslatorConfig {
  typeMap: Readonly<Record<string, string>>;
  /** Insertion order is the order of injected entry-point parameters */
  builtins: Readonly<Record<string, BuiltinMapping>>;
  functionMap: Readonly<Record<string, string>>;
}

export const DEFAULT_CONFIG: TranslatorConfig = {
  typeMap: {
    int: "i32",
    unsigned: "u32",
    uint: "u32",
    float: "f32",
    half: "f16",
    bool: "bool",
  },
  builtins: {
    threadIdx: { attribute: "local_invocation_id", type: "vec3<u32>" },
    blockIdx: { attribute: "workgroup_id", type: "vec3<u32>" },
    gridDim: { attribute: "num_workgroups", type: "vec3<u32>" },
    blockDim: {
      unresolved:
        "WGSL has no builtin for the workgroup size; pass it through a uniform or an override constant",
    },
  },
  functionMap: {
    __syncthreads: "workgroupBarrier",
    sqrtf: "sqrt",
    fabsf: "abs",
    fminf: "min",
    fmaxf: "max",
    expf: "exp",
    logf: "log",
    powf: "pow",
    sinf: "sin",
    cosf: "cos",
    floorf: "floor",
    ceilf: "ceil",
  },
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public errors: string[],
  ) {
    super(errors.length > 0 ? `${message}:\n${errors.map((e) => `  ${e}`).join("\n")}` : message);
    this.name = "ConfigError";
  }
}

/** Validate an untrusted config value (e.g. parsed JSON) */
export function parseTranslatorConfig(value: unknown): TranslatorConfigInput {
  if (Value.Check(TranslatorConfigSchema, value)) {
    return value;
  }
  const errors = [...Value.Errors(TranslatorConfigSchema, value)].map(
    (error) => `${error.path || "/"}: ${error.message}`,
  );
  throw new ConfigError("Invalid translator config", errors);
}

/** Merge a partial config over the defaults, key by key */
export function resolveConfig(input?: TranslatorConfigInput): TranslatorConfig {
  return {
    typeMap: { ...DEFAULT_CONFIG.typeMap, ...input?.typeMap },
    builtins: { ...DEFAULT_CONFIG.builtins, ...input?.builtins },
    functionMap: { ...DEFAULT_CONFIG.functionMap, ...input?.functionMap },
  };
}

/** Own-property lookup, so names such as `constructor` never hit the prototype */
export function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/** Map a source scalar type name; unknown names pass through unchanged */
export function mapType(config: TranslatorConfig, name: string): string {
  return lookup(config.typeMap, name) ?? name;
}
