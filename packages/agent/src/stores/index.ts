export { writeFileAtomic } from "./atomic-write.js";
export { HealthStoreImpl } from "./health-store.js";
export { TimelineStoreImpl } from "./timeline-store.js";
