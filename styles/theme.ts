// Chart styling for rendered river charts (light "dark grid" look)

export const theme = {
  // Colors
  colors: {
    // Base backgrounds
    background: '#ffffff',
    plot: '#eaeaf2',
    grid: '#ffffff',

    // Text
    textPrimary: '#262626',
    textSecondary: '#4d4d4d',
    textMuted: '#7f7f7f',

    // Legend frame
    legendBackground: 'rgba(255, 255, 255, 0.8)',
    legendBorder: '#cccccc',
  },

  // One color per plotted station, assigned in legend order
  series: [
    '#4c72b0', // blue
    '#dd8452', // orange
    '#55a868', // green
    '#c44e52', // red
    '#8172b3', // purple
    '#937860', // brown
  ],

  // Font
  fontFamily: 'DejaVu Sans, Arial, Helvetica, sans-serif',
  fontSize: {
    xs: 10,
    sm: 11,
    base: 13,
    lg: 15,
  },

  // Stroke widths
  stroke: {
    grid: 1,
    series: 1.75,
  },
};

export function seriesColor(index: number): string {
  return theme.series[index % theme.series.length];
}
