export { useViewStore } from "./hooks/use-view-store.js"
export type { WithViewStoreProps } from "./with-view-store.js"
export { WithViewStore } from "./with-view-store.js"
