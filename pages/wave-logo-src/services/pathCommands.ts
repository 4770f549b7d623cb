import type { PathCommand, SubPath } from '../types';
import { arcEndAngle, arcPoint, segmentStart } from './geometry';

/** Four decimals, trailing zeros and negative zero dropped. */
export const formatNumber = (value: number) => {
  const rounded = Number(value.toFixed(4));
  return Object.is(rounded, -0) ? '0' : String(rounded);
};

/**
 * Converts a subpath to move / line / arc / close commands. Arcs longer than a
 * half turn are split in two, so every arc command uses the small-arc flag.
 */
export const subPathToCommands = (path: SubPath): PathCommand[] => {
  if (path.segments.length === 0) return [];
  const start = segmentStart(path.segments[0]);
  const commands: PathCommand[] = [{ type: 'M', x: start.x, y: start.y }];

  for (const segment of path.segments) {
    if (segment.kind === 'polyline') {
      for (let i = 1; i < segment.points.length; i++) {
        commands.push({ type: 'L', x: segment.points[i].x, y: segment.points[i].y });
      }
      continue;
    }

    const pieces = Math.abs(segment.sweepAngle) > Math.PI ? 2 : 1;
    for (let i = 1; i <= pieces; i++) {
      const angle =
        i === pieces ? arcEndAngle(segment) : segment.startAngle + (segment.sweepAngle * i) / pieces;
      const end = arcPoint(segment.center, segment.radius, angle);
      commands.push({
        type: 'A',
        rx: segment.radius,
        ry: segment.radius,
        largeArc: false,
        sweep: segment.sweepAngle > 0,
        x: end.x,
        y: end.y
      });
    }
  }

  if (path.closed) commands.push({ type: 'Z' });
  return commands;
};

export const commandToString = (command: PathCommand): string => {
  switch (command.type) {
    case 'M':
    case 'L':
      return `${command.type} ${formatNumber(command.x)} ${formatNumber(command.y)}`;
    case 'A':
      return [
        'A',
        formatNumber(command.rx),
        formatNumber(command.ry),
        0,
        command.largeArc ? 1 : 0,
        command.sweep ? 1 : 0,
        formatNumber(command.x),
        formatNumber(command.y)
      ].join(' ');
    case 'Z':
      return 'Z';
  }
};

export const commandsToPathData = (commands: PathCommand[]) => commands.map(commandToString).join(' ');

export const subPathToPathData = (path: SubPath) => commandsToPathData(subPathToCommands(path));
