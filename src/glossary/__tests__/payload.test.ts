import {
  buildDebugInfo,
  decodeBody,
  extractTerm,
  tryParseJson,
} from "@src/glossary/payload";

describe("extractTerm", () => {
  it("reads the query string parameter", () => {
    expect(extractTerm({ queryStringParameters: { term: "AWS KMS" } })).toBe(
      "AWS KMS"
    );
  });

  it("reads the path parameter", () => {
    expect(extractTerm({ pathParameters: { term: "IAM" } })).toBe("IAM");
  });

  it("reads the term from a JSON body", () => {
    expect(extractTerm({ body: JSON.stringify({ term: "S3" }) })).toBe("S3");
  });

  it("reads a top-level term from a direct invocation", () => {
    expect(extractTerm({ term: "Lambda" })).toBe("Lambda");
  });

  it("prefers query over path over body over top-level", () => {
    const all = {
      queryStringParameters: { term: "from-query" },
      pathParameters: { term: "from-path" },
      body: JSON.stringify({ term: "from-body" }),
      term: "from-event",
    };
    expect(extractTerm(all)).toBe("from-query");
    expect(extractTerm({ ...all, queryStringParameters: null })).toBe(
      "from-path"
    );
    expect(
      extractTerm({ ...all, queryStringParameters: null, pathParameters: {} })
    ).toBe("from-body");
    expect(
      extractTerm({
        ...all,
        queryStringParameters: null,
        pathParameters: {},
        body: null,
      })
    ).toBe("from-event");
  });

  it("skips empty values and moves to the next source", () => {
    expect(
      extractTerm({
        queryStringParameters: { term: "" },
        pathParameters: { term: "IAM" },
      })
    ).toBe("IAM");
  });

  it("treats an unparseable body as absent", () => {
    expect(extractTerm({ body: "{not json", term: "VPC" })).toBe("VPC");
    expect(extractTerm({ body: "{not json" })).toBe("");
  });

  it("falls through when the body parses but has no term", () => {
    expect(extractTerm({ body: '{"other":"x"}', term: "VPC" })).toBe("VPC");
    expect(extractTerm({ body: "null", term: "VPC" })).toBe("VPC");
  });

  it("decodes base64 bodies", () => {
    const body = Buffer.from(JSON.stringify({ term: "Route 53" })).toString(
      "base64"
    );
    expect(extractTerm({ body, isBase64Encoded: true })).toBe("Route 53");
  });

  it("keeps case and surrounding whitespace", () => {
    expect(extractTerm({ term: "  aws kms " })).toBe("  aws kms ");
  });

  it("ignores non-string term values", () => {
    expect(extractTerm({ term: 42 })).toBe("");
    expect(extractTerm({ queryStringParameters: { term: ["a"] } })).toBe("");
  });

  it("returns empty for payloads that are not objects", () => {
    expect(extractTerm(null)).toBe("");
    expect(extractTerm(undefined)).toBe("");
    expect(extractTerm("term")).toBe("");
    expect(extractTerm(["term"])).toBe("");
  });
});

describe("tryParseJson", () => {
  it("returns the parsed value", () => {
    expect(tryParseJson('{"term":"EC2"}')).toEqual({ term: "EC2" });
  });

  it("returns undefined on invalid JSON", () => {
    expect(tryParseJson("{")).toBeUndefined();
  });
});

describe("decodeBody", () => {
  it("returns plain bodies unchanged", () => {
    expect(decodeBody({ body: "hello" })).toBe("hello");
  });

  it("returns undefined for missing or empty bodies", () => {
    expect(decodeBody({})).toBeUndefined();
    expect(decodeBody({ body: "" })).toBeUndefined();
    expect(decodeBody({ body: null })).toBeUndefined();
  });

  it("decodes when isBase64Encoded is set", () => {
    expect(decodeBody({ body: "aGVsbG8=", isBase64Encoded: true })).toBe(
      "hello"
    );
  });
});

describe("buildDebugInfo", () => {
  it("echoes the request shape and sorted event keys", () => {
    expect(
      buildDebugInfo({
        queryStringParameters: { other: "x" },
        httpMethod: "GET",
        headers: {},
      })
    ).toEqual({
      query_params: { other: "x" },
      path_params: null,
      body: null,
      http_method: "GET",
      event_keys: ["headers", "httpMethod", "queryStringParameters"],
    });
  });

  it("echoes the raw body", () => {
    expect(buildDebugInfo({ body: "{not json" }).body).toBe("{not json");
  });

  it("handles non-object payloads", () => {
    expect(buildDebugInfo(null)).toEqual({
      query_params: null,
      path_params: null,
      body: null,
      http_method: null,
      event_keys: [],
    });
  });
});
