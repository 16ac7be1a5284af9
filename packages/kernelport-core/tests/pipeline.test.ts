import { describe, it, expect } from "vitest";
import { KernelSyntaxError, parseOnly, Severity, translate } from "../src/index.js";

describe("translate", () => {
  it("returns the program, the output and the diagnostics", () => {
    const result = translate("__global__ void k(float* out) { out[blockIdx.x] = 1.0f; }");
    expect(result.program.kernels[0]!.decl.name).toBe("k");
    expect(result.output).toBe(
      "@group(0) @binding(0) var<storage, read_write> out : array<f32>;\n" +
        "\n" +
        "@compute @workgroup_size(64, 1, 1)\n" +
        "fn main(@builtin(workgroup_id) blockIdx : vec3<u32>) {\n" +
        "    out[blockIdx.x] = 1.0f;\n" +
        "}\n",
    );
    expect(result.diagnostics).toEqual([
      {
        rule: "builtins_injected",
        severity: Severity.DEBUG,
        message: "Injected 1 builtin parameter(s)",
        kernel: "k",
      },
    ]);
  });

  it("passes generator options through", () => {
    const result = translate("__global__ void k() {}", { entryPoint: "run" });
    expect(result.output).toBe("@compute @workgroup_size(64, 1, 1)\nfn run() {\n}\n");
  });

  it("gives every call its own diagnostics", () => {
    const first = translate("__global__ int k() {}");
    const second = translate("__global__ void k() {}");
    expect(first.diagnostics).toHaveLength(1);
    expect(second.diagnostics).toEqual([]);
  });

  it("propagates syntax errors", () => {
    expect(() => translate("__global__ void k( {}")).toThrow(KernelSyntaxError);
  });
});

describe("parseOnly", () => {
  it("parses without generating", () => {
    const program = parseOnly("__global__ void a() {}\n__global__ void b() {}");
    expect(program.kernels.map((k) => k.decl.name)).toEqual(["a", "b"]);
  });
});
