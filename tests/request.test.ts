import { describe, expect, it } from "vitest";
import { resolveConfig } from "../src/config";
import { InvalidRequestError } from "../src/errors";
import { buildDataParams, buildRequest, encodeDatasetId } from "../src/request";

const publicConfig = resolveConfig({ baseURL: "https://api.test" }, () => undefined);
const proConfig = resolveConfig(
  { baseURL: "https://api.test", apiKey: "test-key" },
  () => undefined,
);

describe("encodeDatasetId", () => {
  it("keeps a plain hierarchical id intact", () => {
    expect(encodeDatasetId("macro_economics/consumer/eu_consumer_sentiment")).toBe(
      "macro_economics/consumer/eu_consumer_sentiment",
    );
  });

  it("encodes each segment independently", () => {
    expect(encodeDatasetId("sales & retail/é/q?1")).toBe("sales%20%26%20retail/%C3%A9/q%3F1");
  });

  it("round-trips every segment in order", () => {
    const ids = ["a/b/c", "top ic/sub#topic/t%able", "one", "ünï/cödé/100%"];
    for (const id of ids) {
      const decoded = encodeDatasetId(id).split("/").map(decodeURIComponent).join("/");
      expect(decoded).toBe(id);
    }
  });

  it("keeps whitespace at the edges of the id", () => {
    for (const id of ["topic/sub/table ", " topic/sub/table", "topic/ sub /table"]) {
      const decoded = encodeDatasetId(id).split("/").map(decodeURIComponent).join("/");
      expect(decoded).toBe(id);
    }
    expect(encodeDatasetId("topic/sub/table ")).toBe("topic/sub/table%20");
  });

  it("strips leading and trailing slashes", () => {
    expect(encodeDatasetId("/topic/sub/table/")).toBe("topic/sub/table");
  });

  it.each(["", "/", "//", "a//b"])("rejects %j", (id) => {
    expect(() => encodeDatasetId(id)).toThrow(InvalidRequestError);
  });
});

describe("buildDataParams", () => {
  it("includes only the fields that are present", () => {
    expect(buildDataParams({})).toEqual({});
    expect(buildDataParams({ to: "2023-12-31" })).toEqual({ to: "2023-12-31" });
  });

  it("maps from to frm", () => {
    expect(buildDataParams({ from: "2020-01-01", to: "2023-12-31", limit: 1000 })).toEqual({
      frm: "2020-01-01",
      to: "2023-12-31",
      limit: "1000",
    });
  });

  it("passes dates through verbatim", () => {
    expect(buildDataParams({ from: "2024-13-45" })).toEqual({ frm: "2024-13-45" });
  });

  it.each([0, -5, 2.5, Number.NaN])("rejects limit %s", (limit) => {
    expect(() => buildDataParams({ limit })).toThrow(InvalidRequestError);
  });
});

describe("buildRequest", () => {
  it("maps each operation to its path", () => {
    expect(buildRequest(publicConfig, { op: "health" }).url).toBe("https://api.test/health");
    expect(buildRequest(publicConfig, { op: "datasets" }).url).toBe("https://api.test/datasets");
    expect(buildRequest(publicConfig, { op: "metadata" }).url).toBe("https://api.test/metadata");
    expect(
      buildRequest(publicConfig, { op: "metadataOne", id: "macro_economics/prices/eu_hicp_energy" }).url,
    ).toBe("https://api.test/metadata/macro_economics/prices/eu_hicp_energy");
  });

  it("builds the data query string", () => {
    const req = buildRequest(publicConfig, {
      op: "data",
      id: "topic/sub/table",
      query: { from: "2020-01-01", to: "2023-12-31", limit: 1000 },
    });

    expect(req.method).toBe("GET");
    expect(req.path).toBe("/data/topic/sub/table");
    expect(req.url).toBe(
      "https://api.test/data/topic/sub/table?frm=2020-01-01&to=2023-12-31&limit=1000",
    );
    expect(req.params).toEqual({ frm: "2020-01-01", to: "2023-12-31", limit: "1000" });
  });

  it("omits the query string when no filter is given", () => {
    const req = buildRequest(publicConfig, { op: "data", id: "topic/sub/table" });
    expect(req.url).toBe("https://api.test/data/topic/sub/table");
    expect(req.params).toEqual({});
  });

  it("leaves omitted filters out of the query string entirely", () => {
    const req = buildRequest(publicConfig, { op: "data", id: "t/s/x", query: { limit: 5 } });
    const search = new URL(req.url).searchParams;

    expect(req.url).toBe("https://api.test/data/t/s/x?limit=5");
    expect(search.has("frm")).toBe(false);
    expect(search.has("to")).toBe(false);
  });

  it("attaches X-API-Key only when a key is configured", () => {
    const pro = buildRequest(proConfig, { op: "datasets" });
    const open = buildRequest(publicConfig, { op: "datasets" });

    expect(pro.headers["X-API-Key"]).toBe("test-key");
    expect(open.headers).not.toHaveProperty("X-API-Key");
    expect(open.headers.Accept).toBe("application/json");
    expect(open.headers["User-Agent"]).toBe("furnilytics-js/0.2.0");
  });

  it("merges configured extra headers", () => {
    const config = resolveConfig(
      { baseURL: "https://api.test", headers: { "X-Team": "analytics" } },
      () => undefined,
    );
    expect(buildRequest(config, { op: "health" }).headers["X-Team"]).toBe("analytics");
  });

  it("does not touch the config", () => {
    const before = JSON.stringify(proConfig);
    buildRequest(proConfig, { op: "data", id: "a/b/c", query: { limit: 3 } });
    expect(JSON.stringify(proConfig)).toBe(before);
  });
});
