import type { RemapRun } from "../core/runs/RemapRun";

export interface RemapRunRepository {
  save(run: RemapRun): Promise<void>;
}
