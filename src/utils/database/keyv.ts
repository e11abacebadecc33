import Keyv from "keyv"
import { JsonFileStore } from "./jsonFileStore"

export type Db = Keyv<unknown>

// Documents are stored as plain pretty-printed JSON, without Keyv's
// { value, expires } envelope, so the files stay readable and editable.
export function createDb(dir: string, namespace = "assistant"): Db {
    return new Keyv<unknown>({
        namespace,
        store: new JsonFileStore(dir),
        serialize: d => JSON.stringify(d.value, null, 2) + "\n",
        deserialize: (raw: string) => {
            const value: unknown = JSON.parse(raw)
            return { value, expires: undefined }
        },
    })
}
