import { useEffect, useRef } from 'react';
import type { RunStats } from '../../shared/types';
import {
  CANVAS_SIZE,
  ROAD_WIDTH,
  VEHICLE_COLORS,
  advanceVehicles,
  signalLamps,
  spawnFromLaneDetails,
  type CanvasVehicle
} from '../lib/intersectionView';

interface IntersectionCanvasProps {
  stats: RunStats | null;
  running: boolean;
}

const LANE_LABELS = [
  { text: 'Lane 1', x: 10, y: CANVAS_SIZE / 2 - 12, align: 'left' },
  { text: 'Lane 2', x: CANVAS_SIZE / 2, y: 22, align: 'center' },
  { text: 'Lane 3', x: CANVAS_SIZE - 10, y: CANVAS_SIZE / 2 - 12, align: 'right' },
  { text: 'Lane 4', x: CANVAS_SIZE / 2, y: CANVAS_SIZE - 10, align: 'center' }
] as const;

function drawFrame(context: CanvasRenderingContext2D, phase: string, vehicles: CanvasVehicle[]): void {
  const c = CANVAS_SIZE / 2;
  context.fillStyle = '#020617';
  context.fillRect(0, 0, CANVAS_SIZE, CANVAS_SIZE);
  context.fillStyle = '#111827';
  context.fillRect(c - ROAD_WIDTH / 2, 0, ROAD_WIDTH, CANVAS_SIZE);
  context.fillRect(0, c - ROAD_WIDTH / 2, CANVAS_SIZE, ROAD_WIDTH);
  context.strokeStyle = '#4b5563';
  context.lineWidth = 2;
  context.strokeRect(c - 45, c - 45, 90, 90);

  for (const vehicle of vehicles) {
    context.fillStyle = VEHICLE_COLORS[vehicle.vehicleClass];
    context.fillRect(vehicle.x - vehicle.size / 2, vehicle.y - vehicle.size / 2, vehicle.size, vehicle.size);
  }

  for (const lamp of signalLamps(phase)) {
    context.beginPath();
    context.arc(lamp.x, lamp.y, 8, 0, Math.PI * 2);
    context.fillStyle = lamp.color;
    context.fill();
  }

  context.fillStyle = '#a5f3fc';
  context.font = "12px 'Segoe UI', sans-serif";
  for (const label of LANE_LABELS) {
    context.textAlign = label.align;
    context.fillText(label.text, label.x, label.y);
  }
}

export function IntersectionCanvas({ stats, running }: IntersectionCanvasProps) {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const vehiclesRef = useRef<CanvasVehicle[]>([]);
  const previousDetailsRef = useRef<RunStats['laneDetails'] | null>(null);
  const phaseRef = useRef('');

  useEffect(() => {
    phaseRef.current = stats?.phase ?? '';
    if (!stats) {
      vehiclesRef.current = [];
      previousDetailsRef.current = null;
      return;
    }
    const spawned = spawnFromLaneDetails(stats.laneDetails, previousDetailsRef.current);
    vehiclesRef.current = [...vehiclesRef.current, ...spawned];
    previousDetailsRef.current = stats.laneDetails;
  }, [stats]);

  useEffect(() => {
    const context = canvasRef.current?.getContext('2d');
    if (!context) {
      return;
    }

    let frame = 0;
    let lastTime: number | null = null;
    const tick = (time: number) => {
      const elapsed = lastTime === null ? 0 : time - lastTime;
      lastTime = time;
      vehiclesRef.current = advanceVehicles(vehiclesRef.current, elapsed);
      drawFrame(context, phaseRef.current, vehiclesRef.current);
      if (running || vehiclesRef.current.length > 0) {
        frame = window.requestAnimationFrame(tick);
      }
    };
    frame = window.requestAnimationFrame(tick);

    return () => window.cancelAnimationFrame(frame);
  }, [running]);

  return (
    <canvas
      ref={canvasRef}
      className="intersection-canvas"
      width={CANVAS_SIZE}
      height={CANVAS_SIZE}
      role="img"
      aria-label="Intersection signals and vehicles"
    />
  );
}
