import React from 'react';

interface SparklineProps {
  values: readonly number[];
  width?: number;
  height?: number;
  color?: string;
  label: string;
}

/** SVG polyline of a small time series; scaled to its own min/max */
export const Sparkline: React.FC<SparklineProps> = ({
  values,
  width = 240,
  height = 48,
  color = '#1890ff',
  label,
}) => {
  if (values.length === 0) {
    return null;
  }

  const min = Math.min(...values);
  const max = Math.max(...values);
  const span = max - min || 1;
  const step = values.length > 1 ? width / (values.length - 1) : 0;
  const points = values
    .map((v, i) => `${(i * step).toFixed(1)},${(height - ((v - min) / span) * height).toFixed(1)}`)
    .join(' ');

  return (
    <svg
      className="sparkline"
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
      role="img"
      aria-label={label}
    >
      <polyline points={points} fill="none" stroke={color} strokeWidth={1.5} />
    </svg>
  );
};
