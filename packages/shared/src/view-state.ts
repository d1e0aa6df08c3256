import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'

export const VIEW_CONTROLS = ['lockRotation', 'showGrid', 'showLegends'] as const

export type ViewControl = (typeof VIEW_CONTROLS)[number]

export type ViewControls = Record<ViewControl, boolean>

export type ViewAngles = {
  elev: number
  azim: number
}

export type PanelIndex = 0 | 1

export type ViewState = {
  controls: ViewControls
  views: [ViewAngles, ViewAngles]
}

export type ViewAction =
  | { type: 'toggle'; control: ViewControl }
  | { type: 'rotate'; panel: PanelIndex; angles: ViewAngles }
  | { type: 'reset'; angles: ViewAngles }

export const DEFAULT_VIEW_CONTROLS: ViewControls = {
  lockRotation: false,
  showGrid: true,
  showLegends: true,
}

export const createInitialViewState = (angles: ViewAngles): ViewState => ({
  controls: { ...DEFAULT_VIEW_CONTROLS },
  views: [{ ...angles }, { ...angles }],
})

/** 表示トグルと視点回転を適用した新しい状態を返す。 */
export const applyViewAction = (
  state: ViewState,
  action: ViewAction,
): ViewState => {
  switch (action.type) {
    case 'toggle': {
      const controls = {
        ...state.controls,
        [action.control]: !state.controls[action.control],
      }
      if (action.control === 'lockRotation' && controls.lockRotation) {
        // locking snaps the right panel onto the left one
        return { controls, views: [state.views[0], { ...state.views[0] }] }
      }
      return { controls, views: state.views }
    }
    case 'rotate': {
      const angles = { ...action.angles }
      if (state.controls.lockRotation) {
        return { controls: state.controls, views: [angles, { ...angles }] }
      }
      const views: [ViewAngles, ViewAngles] =
        action.panel === 0 ? [angles, state.views[1]] : [state.views[0], angles]
      return { controls: state.controls, views }
    }
    case 'reset':
      return {
        controls: state.controls,
        views: [{ ...action.angles }, { ...action.angles }],
      }
    default:
      return state
  }
}

export type ViewStore = StoreApi<ViewState> & {
  dispatch: (action: ViewAction) => ViewState
}

export const createViewStore = (initial: ViewState): ViewStore => {
  const store = createStore<ViewState>()(() => initial)
  const dispatch = (action: ViewAction): ViewState => {
    const next = applyViewAction(store.getState(), action)
    if (next !== store.getState()) {
      store.setState(next, true)
    }
    return next
  }
  return { ...store, dispatch }
}
