import { motion } from 'framer-motion';
import type { ProbabilityBand } from '../../types/forecast';
import { getBandClass } from '../../utils/colors';

interface BandWidgetProps {
  band: ProbabilityBand;
  label: string;
}

const bandLabels: Record<ProbabilityBand, string> = {
  low: 'LOW',
  medium: 'ELEVATED',
  high: 'HIGH',
};

export function BandWidget({ band, label }: BandWidgetProps) {
  const isHigh = band === 'high';

  return (
    <motion.div
      data-testid="band-widget"
      role="status"
      aria-live="polite"
      aria-label={`${label}: ${bandLabels[band]}`}
      className={`
        px-4 py-2 rounded-lg font-mono text-sm uppercase tracking-wider
        ${getBandClass(band)}
      `}
      initial={{ scale: 1 }}
      animate={isHigh ? { scale: [1, 1.02, 1] } : {}}
      transition={
        isHigh
          ? {
              duration: 2,
              repeat: Infinity,
              ease: 'easeInOut',
            }
          : {}
      }
    >
      <span className="font-bold">{label}:</span>{' '}
      <span className="font-extrabold">{bandLabels[band]}</span>
    </motion.div>
  );
}
