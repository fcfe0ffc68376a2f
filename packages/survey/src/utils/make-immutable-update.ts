import { create, type Patch } from "mutative"

/**
 * Turns an update function written against a mutable draft into one that
 * leaves its input untouched and returns `[nextModel, effect]`.
 *
 * When nothing on the draft changed, the very same model object comes back.
 *
 * @param mutatingUpdate - Mutates the draft model and returns an optional effect
 * @param onPatch - Receives the patches of every transition that changed something
 */
export function makeImmutableUpdate<Msg, Model extends object, Effect>(
  mutatingUpdate: (msg: Msg, draft: Model) => Effect | undefined,
  onPatch?: (patches: Patch[]) => void,
): (msg: Msg, model: Model) => [Model, Effect | undefined] {
  return (msg, model) => {
    let effect: Effect | undefined

    if (!onPatch) {
      const nextModel = create(model, draft => {
        effect = mutatingUpdate(msg, draft as Model)
      })
      return [nextModel, effect]
    }

    const [nextModel, patches] = create(
      model,
      draft => {
        effect = mutatingUpdate(msg, draft as Model)
      },
      { enablePatches: true },
    )

    if (patches.length > 0) {
      onPatch(patches)
    }

    return [nextModel, effect]
  }
}
