import { z } from 'zod'

type JsonPrimitive = string | number | boolean | null

/**
 * JSON として保存できる値
 */
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

const JsonPrimitiveSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([JsonPrimitiveSchema, z.array(JsonValueSchema), z.record(JsonValueSchema)])
)

/**
 * 任意の値を JSON ツリーに変換する
 *
 * Date は ISO 文字列、クラスのインスタンスは列挙可能なプロパティだけになる。
 * undefined は null として扱う。
 */
export function toJsonTree(value: unknown): JsonValue {
    const serialized = JSON.stringify(value)
    if (serialized === undefined) {
        return null
    }
    return JsonValueSchema.parse(JSON.parse(serialized))
}
