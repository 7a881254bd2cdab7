import type { MinuteInterval } from "./interval";

export type LaneAssignment<T> = {
  item: T;
  lane: number;
  laneCount: number;
};

/**
 * Greedy interval colouring for one day column. Items are ordered by start,
 * then end (ties keep input order) and each takes the lowest lane whose last
 * occupant ended at or before its start. `laneCount` is the number of lanes
 * used by the item's overlap cluster.
 */
export function assignLanes<T extends MinuteInterval>(items: readonly T[]): LaneAssignment<T>[] {
  const sorted = [...items].sort((a, b) => a.startMinutes - b.startMinutes || a.endMinutes - b.endMinutes);
  const laneEnds: number[] = [];
  const placed: LaneAssignment<T>[] = [];

  let cluster: LaneAssignment<T>[] = [];
  let clusterEnd = Number.NEGATIVE_INFINITY;
  let clusterLanes = 0;

  const closeCluster = () => {
    for (const entry of cluster) entry.laneCount = clusterLanes;
    cluster = [];
    clusterLanes = 0;
  };

  for (const item of sorted) {
    if (item.startMinutes >= clusterEnd) closeCluster();

    let lane = laneEnds.findIndex((end) => end <= item.startMinutes);
    if (lane === -1) {
      lane = laneEnds.length;
      laneEnds.push(item.endMinutes);
    } else {
      laneEnds[lane] = item.endMinutes;
    }

    const entry: LaneAssignment<T> = { item, lane, laneCount: 0 };
    cluster.push(entry);
    placed.push(entry);
    clusterEnd = Math.max(clusterEnd, item.endMinutes);
    clusterLanes = Math.max(clusterLanes, lane + 1);
  }
  closeCluster();

  return placed;
}
