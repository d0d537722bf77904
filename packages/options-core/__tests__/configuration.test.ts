import { describe, it, expect } from "vitest";

import {
  createAuthenticationConfigurationProvider,
  createConfiguration,
  flattenEnv,
  flattenObject,
  parseConfigurationJson,
} from "../src/index.ts";

describe("flattenObject", () => {
  it("flattens nested objects and arrays into colon paths", () => {
    const layer = flattenObject({
      Auth: { Issuers: ["a", "b"], Empty: null, Flag: true, Count: 3 },
    });

    expect([...layer.entries()]).toEqual([
      ["Auth:Issuers:0", "a"],
      ["Auth:Issuers:1", "b"],
      ["Auth:Empty", ""],
      ["Auth:Flag", "true"],
      ["Auth:Count", "3"],
    ]);
  });
});

describe("flattenEnv", () => {
  it("maps double underscores to colons", () => {
    const layer = flattenEnv({ Authentication__Schemes__Api__Authority: "https://id.test" });

    expect(layer.get("Authentication:Schemes:Api:Authority")).toBe("https://id.test");
  });

  it("keeps only prefixed variables and strips the prefix", () => {
    const layer = flattenEnv(
      { APP_Auth__Challenge: "Token", OTHER: "x", UNSET: undefined },
      "APP_",
    );

    expect([...layer.entries()]).toEqual([["Auth:Challenge", "Token"]]);
  });
});

describe("createConfiguration", () => {
  it("reads values case-insensitively", () => {
    const root = createConfiguration(flattenObject({ Section: { Key: "v" } }));

    expect(root.get("section:key")).toBe("v");
    expect(root.getSection("SECTION").get("KEY")).toBe("v");
    expect(root.getSection("Section").getSection("Key").value).toBe("v");
  });

  it("orders numeric children numerically", () => {
    const items = Array.from({ length: 12 }, (_, i) => `item-${i}`);
    const root = createConfiguration(flattenObject({ List: items }));

    const values = root.getSection("List").getChildren().map((c) => c.value);
    expect(values).toEqual(items);
  });

  it("exposes child keys and paths", () => {
    const root = createConfiguration(flattenObject({ A: { x: "1", y: { z: "2" } } }));

    const children = root.getSection("A").getChildren();
    expect(children.map((c) => [c.key, c.path, c.value])).toEqual([
      ["x", "A:x", "1"],
      ["y", "A:y", undefined],
    ]);
  });

  it("keeps child keys intact when case folding changes their length", () => {
    const root = createConfiguration(
      flattenObject({ Schemes: { "İd": { Issuers: ["a", "b"] } } }),
    );

    const scheme = root.getSection("Schemes").getSection("İd");
    expect(root.getSection("Schemes").getChildren().map((c) => c.key)).toEqual(["İd"]);
    expect(scheme.getChildren().map((c) => c.key)).toEqual(["Issuers"]);
    expect(scheme.getSection("Issuers").getChildren().map((c) => c.value)).toEqual(["a", "b"]);
  });

  it("lets later layers override earlier ones", () => {
    const root = createConfiguration(
      flattenObject({ A: { Key: "file" } }),
      flattenEnv({ a__key: "env" }),
    );

    expect(root.get("A:Key")).toBe("env");
    expect(root.getSection("A").getChildren()).toHaveLength(1);
  });

  it("returns empty sections for missing paths", () => {
    const root = createConfiguration(flattenObject({ A: { Key: "v" } }));
    const missing = root.getSection("Nope").getSection("Deeper");

    expect(missing.exists()).toBe(false);
    expect(missing.value).toBeUndefined();
    expect(missing.getChildren()).toEqual([]);
    expect(root.getSection("A").exists()).toBe(true);
  });
});

describe("createAuthenticationConfigurationProvider", () => {
  it("resolves Authentication:Schemes:<name>", () => {
    const root = createConfiguration(
      flattenObject({ Authentication: { Schemes: { Api: { Authority: "https://id.test" } } } }),
    );
    const provider = createAuthenticationConfigurationProvider(root);

    const section = provider.getSchemeConfiguration("Api");
    expect(section.path).toBe("Authentication:Schemes:Api");
    expect(section.get("Authority")).toBe("https://id.test");
  });

  it("supports a custom root section name", () => {
    const root = createConfiguration(flattenObject({ Auth: { Schemes: { Api: { Challenge: "X" } } } }));
    const provider = createAuthenticationConfigurationProvider(root, "Auth");

    expect(provider.getSchemeConfiguration("Api").get("Challenge")).toBe("X");
  });
});

describe("parseConfigurationJson", () => {
  it("accepts an object document", () => {
    expect(parseConfigurationJson('{"A":{"B":[1,"x",null]}}')).toEqual({ A: { B: [1, "x", null] } });
  });

  it("rejects a non-object root", () => {
    expect(() => parseConfigurationJson("[1,2]")).toThrow("configuration document must be a JSON object");
    expect(() => parseConfigurationJson('"x"')).toThrow("configuration document must be a JSON object");
  });
});
