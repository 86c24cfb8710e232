import type { ServeOption } from "../pipeline.js";

/** GET `path` answers 302 with `target` as Location. */
export function redirectOption(path: string, target: string): ServeOption {
  return (_owner, mux) => {
    mux.get(path, (c) => c.redirect(target, 302));
    return mux;
  };
}
