const REFERENCE_IRRADIANCE_WM2 = 1000;

// capacity × (ghi / 1000) × efficiency, clamped to [0, capacity]
export const pvPower = (ghiWm2: number, capacityKw: number, efficiency: number): number => {
  if (!Number.isFinite(ghiWm2)) {
    return 0;
  }

  const powerKw = capacityKw * (ghiWm2 / REFERENCE_IRRADIANCE_WM2) * efficiency;
  return Math.max(0, Math.min(capacityKw, powerKw));
};

export const pvSeries = (
  ghiWm2: readonly number[],
  config: { readonly pvCapacityKw: number; readonly pvEfficiency: number },
): number[] => ghiWm2.map((ghi) => pvPower(ghi, config.pvCapacityKw, config.pvEfficiency));
