interface LoadingSkeletonProps {
  className?: string;
  count?: number;
  ariaLabel?: string;
}

export function LoadingSkeleton({ className, count = 1, ariaLabel = 'Loading' }: LoadingSkeletonProps) {
  const lines = Array.from({ length: Math.max(1, count) }, (_, index) => index);
  return (
    <div className={['loading-skeleton-group', className].filter(Boolean).join(' ')} role="status" aria-label={ariaLabel}>
      {lines.map((line) => (
        <span key={line} className="loading-skeleton loading-skeleton-line" aria-hidden="true" />
      ))}
    </div>
  );
}
