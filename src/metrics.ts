import type { MetricName } from './types'

export type MetricDefinition = {
  name: MetricName
  /** The name displayed in the console summary. */
  label: string
  /** The libvmaf feature to enable; VMAF itself is always computed. */
  feature?: string
  /** The keys reporting the metric in the libvmaf log, in lookup order. */
  logKeys: string[]
  /** The console decimal places. */
  precision: number
}

export const Metrics: Readonly<Record<MetricName, MetricDefinition>> = {
  vmaf: { name: 'vmaf', label: 'VMAF', logKeys: ['vmaf'], precision: 2 },
  psnr: { name: 'psnr', label: 'PSNR', feature: 'psnr', logKeys: ['psnr_y', 'psnr'], precision: 2 },
  ssim: { name: 'ssim', label: 'SSIM', feature: 'float_ssim', logKeys: ['float_ssim', 'ssim'], precision: 4 },
  ms_ssim: {
    name: 'ms_ssim',
    label: 'MS-SSIM',
    feature: 'float_ms_ssim',
    logKeys: ['float_ms_ssim', 'ms_ssim'],
    precision: 4,
  },
}

/** Returns the requested metrics list, VMAF first. */
export function selectMetrics({ psnr, ssim, msSsim }: { psnr: boolean; ssim: boolean; msSsim: boolean }): MetricName[] {
  const metrics: MetricName[] = ['vmaf']
  if (psnr) metrics.push('psnr')
  if (ssim) metrics.push('ssim')
  if (msSsim) metrics.push('ms_ssim')
  return metrics
}
