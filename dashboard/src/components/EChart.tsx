import { useEffect, useRef } from 'react';
import * as echarts from 'echarts';

interface EChartProps {
  option: echarts.EChartsOption;
  className?: string;
  ariaLabel?: string;
}

export function EChart({ option, className, ariaLabel }: EChartProps) {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const instanceRef = useRef<echarts.ECharts | null>(null);
  const latestOptionRef = useRef(option);
  latestOptionRef.current = option;

  useEffect(() => {
    const container = containerRef.current;
    if (!container) {
      return;
    }

    const instance = echarts.init(container);
    instanceRef.current = instance;
    instance.setOption(latestOptionRef.current);

    const observer = new ResizeObserver(() => instance.resize());
    observer.observe(container);

    return () => {
      observer.disconnect();
      instance.dispose();
      instanceRef.current = null;
    };
  }, []);

  // Series are replaced wholesale; axes and grid merge so bars animate between polls.
  useEffect(() => {
    instanceRef.current?.setOption(option, { replaceMerge: ['series'], lazyUpdate: true });
  }, [option]);

  return <div ref={containerRef} className={className ?? 'chart'} role="img" aria-label={ariaLabel} />;
}
