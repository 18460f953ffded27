import { Skeleton } from '../ui/Skeleton';

export function LoadingView() {
  return (
    <div data-testid="dashboard-loading" className="max-w-5xl mx-auto p-4 space-y-4" aria-busy="true">
      <Skeleton className="h-10 w-3/4" />
      <div className="panel p-5 space-y-3">
        <Skeleton className="h-8 w-1/2 mx-auto" />
        <Skeleton className="h-4 w-1/3 mx-auto" />
      </div>
      <Skeleton className="h-[260px] w-full" />
      <Skeleton className="h-[360px] w-full" />
    </div>
  );
}
