import type {
  BaselineEntity,
  Entity,
  MetricName,
  Rate,
  Role,
  WindowLabel,
} from "@/lib/domain/types";
import { GOALIE_METRICS } from "@/lib/domain/types";
import type { BlendWeights, Configuration } from "./config";
import { DEFAULT_BLEND_WEIGHTS } from "./config";

function present(v: Rate | undefined): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

/**
 * Weighted average of whichever windows are present. Absent windows leave
 * both numerator and denominator; the remaining weights renormalize.
 * Null iff every window is absent.
 */
export function blend(
  recent: Rate | undefined,
  mid: Rate | undefined,
  priorSeason: Rate | undefined,
  weights: BlendWeights = DEFAULT_BLEND_WEIGHTS
): number | null {
  let num = 0;
  let den = 0;
  if (present(recent)) {
    num += weights.recent * recent;
    den += weights.recent;
  }
  if (present(mid)) {
    num += weights.mid * mid;
    den += weights.mid;
  }
  if (present(priorSeason)) {
    num += weights.prior_season * priorSeason;
    den += weights.prior_season;
  }
  return den > 0 ? num / den : null;
}

export type WindowValues = Partial<Record<WindowLabel, Rate>>;

// Season-to-date stands in for the middle layer when no mid window was sampled
export function blendWindows(windows: WindowValues, weights: BlendWeights = DEFAULT_BLEND_WEIGHTS): number | null {
  const mid = present(windows.mid) ? windows.mid : windows.season;
  return blend(windows.recent, mid, windows.priorSeason, weights);
}

export function fallbackRate(role: Role, metric: MetricName, config: Configuration): number | null {
  const v = config.fallback_rates[role][metric];
  return v === undefined ? null : v;
}

export function metricsForRole(role: Role, config: Configuration): readonly MetricName[] {
  return role === "G" ? GOALIE_METRICS : config.projected_metrics;
}

/**
 * The explicit fallback step: every unset rate the role projects takes the
 * role table's constant and is listed in `fallback_metrics`.
 */
export function withFallbackRates(entity: Entity, config: Configuration): BaselineEntity {
  const rates: Partial<Record<MetricName, number>> = {};
  const fallback_metrics: MetricName[] = [];
  for (const metric of metricsForRole(entity.role, config)) {
    const v = entity.per_unit_rates[metric];
    if (present(v)) {
      rates[metric] = v;
      continue;
    }
    const fb = fallbackRate(entity.role, metric, config);
    if (fb === null) continue;
    rates[metric] = fb;
    fallback_metrics.push(metric);
  }
  return { ...entity, per_unit_rates: rates, fallback_metrics };
}
