import type { EChartsOption } from 'echarts';
import type { LaneNumber, RunStats, VehicleClass } from '../../shared/types';
import { VEHICLE_LABELS } from './runInsights';

const LANES: readonly LaneNumber[] = [1, 2, 3, 4];
const CLASS_ORDER: readonly VehicleClass[] = ['car', 'bus', 'truck', 'rickshaw', 'bike'];

const CLASS_COLORS: Record<VehicleClass, string> = {
  car: '#2563eb',
  bus: '#f59e0b',
  truck: '#dc2626',
  rickshaw: '#10b981',
  bike: '#8b5cf6'
};

function hasClassBreakdown(stats: RunStats): boolean {
  return LANES.some((lane) => CLASS_ORDER.some((vehicleClass) => stats.laneDetails[lane][vehicleClass] > 0));
}

/**
 * Stacked bars per lane when the worker reports a class breakdown, plain lane
 * totals otherwise.
 */
export function laneVolumeOption(stats: RunStats): EChartsOption {
  const categories = LANES.map((lane) => `Lane ${lane}`);
  const base: EChartsOption = {
    animationDuration: 300,
    grid: { left: 48, right: 16, top: 40, bottom: 32 },
    tooltip: { trigger: 'axis', axisPointer: { type: 'shadow' } },
    xAxis: { type: 'category', data: categories },
    yAxis: { type: 'value', name: 'Vehicles', minInterval: 1 }
  };

  if (!hasClassBreakdown(stats)) {
    return {
      ...base,
      series: [
        {
          type: 'bar',
          name: 'Total',
          data: LANES.map((lane) => stats.laneTotals[lane]),
          itemStyle: { color: '#1d4ed8' },
          barMaxWidth: 48
        }
      ]
    };
  }

  return {
    ...base,
    legend: { top: 0 },
    series: CLASS_ORDER.map((vehicleClass) => ({
      type: 'bar' as const,
      name: VEHICLE_LABELS[vehicleClass],
      stack: 'lane',
      data: LANES.map((lane) => stats.laneDetails[lane][vehicleClass]),
      itemStyle: { color: CLASS_COLORS[vehicleClass] },
      barMaxWidth: 48
    }))
  };
}

export function throughputTrendOption(history: number[]): EChartsOption {
  return {
    animation: false,
    grid: { left: 40, right: 12, top: 16, bottom: 24 },
    tooltip: { trigger: 'axis' },
    xAxis: { type: 'category', data: history.map((_, index) => String(index + 1)), show: false },
    yAxis: { type: 'value', scale: true },
    series: [
      {
        type: 'line',
        name: 'Throughput',
        data: history,
        smooth: true,
        showSymbol: false,
        lineStyle: { width: 2, color: '#0f766e' },
        areaStyle: { color: 'rgba(15, 118, 110, 0.12)' }
      }
    ]
  };
}
