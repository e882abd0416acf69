import axios from "axios";
import { AgentSessionClient, MISSING_AGENT_ID, MISSING_API_KEY } from "../../../src/services/agent/sessions";
import { ConfigSchema, type AgentConfig } from "../../../src/config/schema";
import { ConfigurationError, ProviderError } from "../../../src/errors";
import { fakeAdapter, type RecordedRequest } from "../../helpers/fixtures";

const agentConfig = (overrides: Partial<AgentConfig> = {}): AgentConfig => ({
  ...ConfigSchema.parse({}).agent,
  api_key: "test-secret",
  agent_id: "wf_test",
  base_url: "http://agent.test/v1/",
  ...overrides,
});

function userOf(request: RecordedRequest): unknown {
  const body = request.data;
  return typeof body === "object" && body !== null && "user" in body ? body.user : undefined;
}

function issuingClient(requests: RecordedRequest[], config: AgentConfig = agentConfig()) {
  let counter = 0;
  const http = axios.create({
    adapter: fakeAdapter(() => {
      counter++;
      return { status: 200, data: { id: `cksess_${counter}`, client_secret: `secret_${counter}`, object: "chatkit.session" } };
    }, requests),
  });
  return new AgentSessionClient(config, http);
}

describe("AgentSessionClient", () => {
  test("creates a session for the configured workflow", async () => {
    const requests: RecordedRequest[] = [];
    const client = issuingClient(requests);

    const session = await client.createSession({ userId: "user-1", metadata: { plan: "gold" } });

    expect(session).toEqual({ session_id: "cksess_1", client_secret: "secret_1" });
    expect(requests[0].method).toBe("post");
    expect(requests[0].url).toBe("http://agent.test/v1/chatkit/sessions");
    expect(requests[0].data).toEqual({ workflow: { id: "wf_test" }, user: "user-1", metadata: { plan: "gold" } });
    expect(requests[0].headers["Authorization"]).toBe("Bearer test-secret");
    expect(requests[0].headers["OpenAI-Beta"]).toBe("chatkit_beta=v1");
  });

  test("anonymous sessions get a generated user id", async () => {
    const requests: RecordedRequest[] = [];
    const client = issuingClient(requests);

    await client.createSession();
    await client.createSession();

    const users = requests.map(userOf);
    expect(users[0]).toMatch(/^anonymous-[0-9a-f-]{36}$/);
    expect(users[1]).not.toBe(users[0]);
  });

  test("refresh issues a new session to the same user", async () => {
    const requests: RecordedRequest[] = [];
    const client = issuingClient(requests);
    const first = await client.createSession({ userId: "user-9" });

    const refreshed = await client.refresh(first.client_secret);

    expect(refreshed.client_secret).toBe("secret_2");
    expect(userOf(requests[1])).toBe("user-9");
  });

  test("missing credentials are configuration errors and make no request", async () => {
    const requests: RecordedRequest[] = [];

    await expect(issuingClient(requests, agentConfig({ api_key: "" })).createSession()).rejects.toThrow(MISSING_API_KEY);
    await expect(issuingClient(requests, agentConfig({ agent_id: "" })).createSession()).rejects.toThrow(MISSING_AGENT_ID);
    expect(requests).toEqual([]);
  });

  test("reports whether an agent is configured", () => {
    expect(issuingClient([]).configured).toBe(true);
    expect(issuingClient([], agentConfig({ agent_id: "" })).configured).toBe(false);
    expect(issuingClient([]).agentId).toBe("wf_test");
  });

  test("rejected credentials are configuration errors", async () => {
    const http = axios.create({ adapter: fakeAdapter(() => ({ status: 401, data: { error: { message: "bad key" } } })) });
    const client = new AgentSessionClient(agentConfig(), http);

    await expect(client.createSession()).rejects.toThrow(ConfigurationError);
  });

  test("server errors and malformed replies are provider errors", async () => {
    const failing = new AgentSessionClient(
      agentConfig(),
      axios.create({ adapter: fakeAdapter(() => ({ status: 502, data: "bad gateway" })) })
    );
    const malformed = new AgentSessionClient(
      agentConfig(),
      axios.create({ adapter: fakeAdapter(() => ({ status: 200, data: { id: "cksess_1" } })) })
    );

    await expect(failing.createSession()).rejects.toThrow(ProviderError);
    await expect(malformed.createSession()).rejects.toThrow("Invalid response format from agent service");
  });
});
