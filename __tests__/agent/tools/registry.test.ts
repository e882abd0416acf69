import { z } from "zod";
import { Tool, type ToolParameters } from "../../../src/agent/tools/base";
import { ToolRegistry } from "../../../src/agent/tools/registry";

const EchoArgs = z.object({ text: z.string(), times: z.number().int().positive().default(1) });

class EchoTool extends Tool<z.infer<typeof EchoArgs>> {
  get name() { return "echo"; }
  get description() { return "Repeats text"; }
  get parameters(): ToolParameters {
    return {
      type: "object",
      properties: {
        text: { type: "string", description: "Text to repeat" },
        times: { type: "integer", description: "Repetitions", minimum: 1 },
      },
      required: ["text"],
    };
  }
  protected get argsSchema() {
    return EchoArgs;
  }
  async execute(params: z.infer<typeof EchoArgs>): Promise<string> {
    return params.text.repeat(params.times);
  }
}

class BrokenTool extends EchoTool {
  get name() { return "broken"; }
  async execute(): Promise<string> {
    throw new Error("tool crashed");
  }
}

describe("ToolRegistry", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
    registry.register(new EchoTool());
  });

  test("dispatches by name with validated parameters", async () => {
    await expect(registry.execute("echo", { text: "ab", times: 3 })).resolves.toBe("ababab");
    await expect(registry.execute("echo", { text: "x" })).resolves.toBe("x");
  });

  test("unknown tools come back as an error string", async () => {
    await expect(registry.execute("nope", {})).resolves.toBe("Error: Tool 'nope' not found");
  });

  test("invalid parameters come back as an error string", async () => {
    await expect(registry.execute("echo", { times: 0 })).resolves.toBe(
      "Error: Invalid parameters for tool 'echo': text: Required; times: Number must be greater than 0"
    );
  });

  test("errors thrown by a tool propagate", async () => {
    registry.register(new BrokenTool());
    await expect(registry.execute("broken", { text: "x" })).rejects.toThrow("tool crashed");
  });

  test("exports function definitions for every registered tool", () => {
    expect(registry.getDefinitions()).toEqual([
      {
        type: "function",
        function: {
          name: "echo",
          description: "Repeats text",
          parameters: {
            type: "object",
            properties: {
              text: { type: "string", description: "Text to repeat" },
              times: { type: "integer", description: "Repetitions", minimum: 1 },
            },
            required: ["text"],
          },
        },
      },
    ]);
  });

  test("tracks registrations", () => {
    registry.register(new BrokenTool());
    expect(registry.toolNames).toEqual(["echo", "broken"]);
    expect(registry.has("broken")).toBe(true);

    registry.unregister("broken");
    expect(registry.size).toBe(1);
    expect(registry.get("broken")).toBeUndefined();
  });
});
