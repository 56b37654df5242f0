import { describe, expect, it } from "vitest";
import { CfApiClient } from "../src/cf-api.js";
import { NotFoundError, ValidationError } from "../src/errors.js";
import { parseUsersArgs, prepareSubmitPayload } from "../src/payload.js";
import { FakeTransport, resource } from "./helpers/fakes.js";

function platform() {
  return new FakeTransport()
    .on("GET", "/v2/service_instances", {
      resources: [
        resource("guid-kafka", { name: "my-kafka", tags: ["stream"], service_plan_url: "/v2/service_plans/p-kafka" }),
        resource("guid-zk", { name: "my-zk", tags: [], service_plan_url: "/v2/service_plans/p-zk" }),
        resource("guid-kafka-2", { name: "other-kafka", tags: [], service_plan_url: "/v2/service_plans/p-kafka" })
      ]
    })
    .on("GET", "/v2/service_instances/guid-kafka", resource("guid-kafka", { name: "my-kafka", tags: ["stream"], service_plan_url: "/v2/service_plans/p-kafka" }))
    .on("GET", "/v2/service_instances/guid-zk", resource("guid-zk", { name: "my-zk", tags: [], service_plan_url: "/v2/service_plans/p-zk" }))
    .on("GET", "/v2/service_instances/guid-kafka-2", resource("guid-kafka-2", { name: "other-kafka", tags: [], service_plan_url: "/v2/service_plans/p-kafka" }))
    .on("GET", "/v2/service_plans/p-kafka", resource("p-kafka", { name: "shared", service_url: "/v2/services/s-kafka" }))
    .on("GET", "/v2/service_plans/p-zk", resource("p-zk", { name: "small", service_url: "/v2/services/s-zk" }))
    .on("GET", "/v2/services/s-kafka", resource("s-kafka", { label: "kafka" }))
    .on("GET", "/v2/services/s-zk", resource("s-zk", { label: "zookeeper" }))
    .on("POST", "/v2/service_keys", resource("key-1", { name: "DummyKey123", credentials: { uri: "host:1234" } }, "/v2/service_keys/key-1"))
    .on("DELETE", "/v2/service_keys/key-1", "");
}

describe("prepareSubmitPayload", () => {
  it("maps each service label to its instance and adds usersArgs", async () => {
    const api = new CfApiClient(platform());

    const payload = await prepareSubmitPayload(api, ["my-kafka", "my-zk"], { topic: "events" });

    expect(payload).toEqual({
      kafka: [{ label: "kafka", name: "my-kafka", plan: "shared", tags: ["stream"], credentials: { uri: "host:1234" } }],
      zookeeper: [{ label: "zookeeper", name: "my-zk", plan: "small", tags: [], credentials: { uri: "host:1234" } }],
      usersArgs: { topic: "events" }
    });
  });

  it("keeps the last instance when two share a label", async () => {
    const api = new CfApiClient(platform());

    const payload = await prepareSubmitPayload(api, ["my-kafka", "other-kafka"], {});

    expect(payload.kafka).toEqual([
      { label: "kafka", name: "other-kafka", plan: "shared", tags: [], credentials: { uri: "host:1234" } }
    ]);
  });

  it("aborts on the first instance that cannot be found", async () => {
    const transport = platform();
    const api = new CfApiClient(transport);

    await expect(prepareSubmitPayload(api, ["missing", "my-kafka"], {})).rejects.toBeInstanceOf(NotFoundError);
    expect(transport.calls).toEqual([{ path: "/v2/service_instances", method: "GET", body: undefined }]);
  });

  it("returns only usersArgs for an empty instance list", async () => {
    const api = new CfApiClient(platform());
    await expect(prepareSubmitPayload(api, [], { a: "1" })).resolves.toEqual({ usersArgs: { a: "1" } });
  });
});

describe("parseUsersArgs", () => {
  it("splits on the first equals sign", () => {
    expect(parseUsersArgs(["topic=events", "filter=a=b", "empty="])).toEqual({
      topic: "events",
      filter: "a=b",
      empty: ""
    });
  });

  it("rejects pairs without a key", () => {
    expect(() => parseUsersArgs(["=value"])).toThrow(ValidationError);
    expect(() => parseUsersArgs(["novalue"])).toThrow('Expected key=value, got "novalue"');
  });
});
