import debug from "debug"

export const log = {
    chaining: debug("int64-hashtables:chaining"),
    probing: debug("int64-hashtables:probing"),
}
