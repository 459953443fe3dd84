/**
 * PortfolioValueChart component
 *
 * Displays portfolio value and cost over time with EMA50 and SMA200 overlays.
 */

import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  Legend,
} from 'recharts';
import type { TimeSeriesPoint } from '../types';
import { calcEMA, calcSMA } from '../engine/movingAverages';

export interface ChartRow {
  date: string;
  dateLabel: string;
  value: number;
  cost: number;
  ema50?: number;
  sma200?: number;
}

interface PortfolioValueChartProps {
  points: TimeSeriesPoint[];
}

/**
 * Format date for display (MM/DD or MM/YY for longer ranges)
 */
export function formatDate(dateStr: string, isLongRange: boolean): string {
  const [year = '', month = '', day = ''] = dateStr.split('-');
  if (isLongRange) {
    return `${Number(month)}/${year.slice(-2)}`;
  }
  return `${Number(month)}/${Number(day)}`;
}

/**
 * Build chart rows from oldest-first time series points
 */
export function toChartData(points: TimeSeriesPoint[]): ChartRow[] {
  const isLongRange = points.length > 180;
  const values = points.map((p) => p.value);
  const ema50 = calcEMA(values, 50);
  const sma200 = calcSMA(values, 200);

  return points.map((point, i) => ({
    date: point.date,
    dateLabel: formatDate(point.date, isLongRange),
    value: point.value,
    cost: point.cost,
    ema50: ema50[i],
    sma200: sma200[i],
  }));
}

interface ValueTooltipProps {
  active?: boolean;
  payload?: Array<{ payload?: ChartRow }>;
}

function ValueTooltip({ active, payload }: ValueTooltipProps) {
  const row = payload?.[0]?.payload;
  if (!active || !row) {
    return null;
  }
  return (
    <div className="bg-zinc-800 border border-zinc-700 rounded p-2 shadow-lg">
      <p className="text-xs text-zinc-400 mb-1">{row.date}</p>
      <p className="text-sm font-semibold text-zinc-100">Value: ${row.value.toFixed(2)}</p>
      <p className="text-xs text-zinc-400">Cost: ${row.cost.toFixed(2)}</p>
      {row.ema50 !== undefined && (
        <p className="text-xs text-zinc-400">50d EMA: ${row.ema50.toFixed(2)}</p>
      )}
      {row.sma200 !== undefined && (
        <p className="text-xs text-zinc-400">200d SMA: ${row.sma200.toFixed(2)}</p>
      )}
    </div>
  );
}

export function PortfolioValueChart({ points }: PortfolioValueChartProps) {
  if (points.length === 0) {
    return (
      <div className="bg-zinc-800 rounded p-8 text-center text-zinc-500">
        No data available
      </div>
    );
  }

  const chartData = toChartData(points);

  return (
    <ResponsiveContainer width="100%" height={400}>
      <LineChart data={chartData} margin={{ top: 5, right: 10, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#3f3f46" />
        <XAxis
          dataKey="dateLabel"
          stroke="#71717a"
          tick={{ fill: '#71717a', fontSize: 11 }}
          interval="preserveStartEnd"
        />
        <YAxis
          stroke="#71717a"
          tick={{ fill: '#71717a', fontSize: 11 }}
          label={{ value: '$', position: 'insideLeft', fill: '#71717a', fontSize: 11 }}
        />
        <Tooltip content={<ValueTooltip />} />
        <Legend wrapperStyle={{ fontSize: '11px', color: '#71717a' }} iconType="line" />
        {/* Value line (strongest) */}
        <Line
          type="monotone"
          dataKey="value"
          stroke="#e4e4e7"
          strokeWidth={2.5}
          dot={false}
          activeDot={{ r: 5, fill: '#e4e4e7' }}
          name="Value"
        />
        <Line
          type="monotone"
          dataKey="cost"
          stroke="#f59e0b"
          strokeWidth={1.5}
          strokeDasharray="3 3"
          dot={false}
          activeDot={{ r: 3, fill: '#f59e0b' }}
          name="Cost"
        />
        <Line
          type="monotone"
          dataKey="ema50"
          stroke="#8b5cf6"
          strokeWidth={1.5}
          strokeDasharray="2 2"
          dot={false}
          activeDot={{ r: 3, fill: '#8b5cf6' }}
          name="50d EMA"
        />
        <Line
          type="monotone"
          dataKey="sma200"
          stroke="#10b981"
          strokeWidth={1.5}
          strokeDasharray="5 5"
          dot={false}
          activeDot={{ r: 3, fill: '#10b981' }}
          name="200d SMA"
        />
      </LineChart>
    </ResponsiveContainer>
  );
}
