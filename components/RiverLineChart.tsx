import { theme } from '@/styles/theme';
import {
  createSegmentedPath,
  extent,
  linearScale,
  niceTicks,
  timeTicks,
} from '@/lib/river/chartScales';
import { formatTickLabel } from '@/lib/river/formatTimestamp';

export interface ChartLine {
  location: string;
  color: string;
  points: { time: number; value: number | null }[];
}

interface RiverLineChartProps {
  lines: ChartLine[];
  yLabel: string;
  attribution: string;
  width?: number;
  height?: number;
}

const MARGIN = { top: 24, right: 24, bottom: 96, left: 72 };

function formatAxisValue(value: number): string {
  return String(Number(value.toFixed(4)));
}

/**
 * Static multi-series line chart, rendered to markup on the server and
 * rasterized by the chart renderer. One line per location.
 */
export function RiverLineChart({
  lines,
  yLabel,
  attribution,
  width = 800,
  height = 500,
}: RiverLineChartProps) {
  const plotLeft = MARGIN.left;
  const plotTop = MARGIN.top;
  const plotRight = width - MARGIN.right;
  const plotBottom = height - MARGIN.bottom;

  const times = lines.flatMap((line) => line.points.map((p) => p.time));
  const values = lines.flatMap((line) =>
    line.points.flatMap((p) => (p.value === null ? [] : [p.value]))
  );

  const [timeStart, timeEnd] = extent(times) ?? [0, 1];
  const [valueMin, valueMax] = extent(values) ?? [0, 1];
  const y = niceTicks(valueMin, valueMax);

  const xScale = linearScale([timeStart, timeEnd], [plotLeft, plotRight]);
  const yScale = linearScale(y.domain, [plotBottom, plotTop]);
  const xTicks = timeTicks(timeStart, timeEnd);

  return (
    <svg
      xmlns="http://www.w3.org/2000/svg"
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
      fontFamily={theme.fontFamily}
    >
      <rect x="0" y="0" width={width} height={height} fill={theme.colors.background} />
      <rect
        x={plotLeft}
        y={plotTop}
        width={plotRight - plotLeft}
        height={plotBottom - plotTop}
        fill={theme.colors.plot}
      />

      {/* Grid and y-axis labels */}
      {y.ticks.map((tick) => (
        <g key={`y-${tick}`}>
          <line
            x1={plotLeft}
            y1={yScale(tick)}
            x2={plotRight}
            y2={yScale(tick)}
            stroke={theme.colors.grid}
            strokeWidth={theme.stroke.grid}
          />
          <text
            x={plotLeft - 8}
            y={yScale(tick)}
            textAnchor="end"
            dominantBaseline="middle"
            fontSize={theme.fontSize.sm}
            fill={theme.colors.textSecondary}
          >
            {formatAxisValue(tick)}
          </text>
        </g>
      ))}

      {/* Grid and rotated date labels */}
      {xTicks.map((tick) => (
        <g key={`x-${tick}`}>
          <line
            x1={xScale(tick)}
            y1={plotTop}
            x2={xScale(tick)}
            y2={plotBottom}
            stroke={theme.colors.grid}
            strokeWidth={theme.stroke.grid}
          />
          <text
            x={xScale(tick)}
            y={plotBottom + 14}
            textAnchor="end"
            transform={`rotate(-30 ${xScale(tick)} ${plotBottom + 14})`}
            fontSize={theme.fontSize.sm}
            fill={theme.colors.textSecondary}
          >
            {formatTickLabel(new Date(tick))}
          </text>
        </g>
      ))}

      <text
        x={18}
        y={(plotTop + plotBottom) / 2}
        textAnchor="middle"
        transform={`rotate(-90 18 ${(plotTop + plotBottom) / 2})`}
        fontSize={theme.fontSize.base}
        fill={theme.colors.textPrimary}
      >
        {yLabel}
      </text>

      {lines.map((line) => (
        <path
          key={line.location}
          d={createSegmentedPath(
            line.points.map((p) => ({
              x: xScale(p.time),
              y: p.value === null ? null : yScale(p.value),
            }))
          )}
          fill="none"
          stroke={line.color}
          strokeWidth={theme.stroke.series}
          strokeLinecap="round"
          strokeLinejoin="round"
        />
      ))}

      {/* Legend */}
      <rect
        x={plotLeft + 8}
        y={plotTop + 8}
        width={190}
        height={lines.length * 18 + 10}
        rx={4}
        fill={theme.colors.legendBackground}
        stroke={theme.colors.legendBorder}
      />
      {lines.map((line, i) => (
        <g key={`legend-${line.location}`}>
          <line
            x1={plotLeft + 16}
            y1={plotTop + 22 + i * 18}
            x2={plotLeft + 36}
            y2={plotTop + 22 + i * 18}
            stroke={line.color}
            strokeWidth={2.5}
          />
          <text
            x={plotLeft + 44}
            y={plotTop + 22 + i * 18}
            dominantBaseline="middle"
            fontSize={theme.fontSize.sm}
            fill={theme.colors.textPrimary}
          >
            {line.location}
          </text>
        </g>
      ))}

      {/* Attribution, lower-right corner of the plot */}
      <text
        x={plotRight - 6}
        y={plotBottom - 6}
        textAnchor="end"
        fontSize={theme.fontSize.xs}
        fill={theme.colors.textMuted}
      >
        {attribution}
      </text>
    </svg>
  );
}
