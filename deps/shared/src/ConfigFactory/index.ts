import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Assert, Convert, Default } from "@sinclair/typebox/value";

type Env = Record<string, string | undefined>;

/**
 * 以 TypeBox schema 從環境變數建立設定讀取函式。
 * 每次呼叫都會重新讀取 env，空字串視為未設定。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env?: Env
): () => Static<T> {
  return () => {
    const source = env ?? process.env;
    const picked: Env = {};
    for (const key of Object.keys(schema.properties)) {
      const value = source[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    const config = Convert(schema, Default(schema, picked));
    Assert(schema, config);
    return config;
  };
}

export function envBoolean() {
  return t.Boolean();
}
