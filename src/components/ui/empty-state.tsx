import type { Icon } from '@phosphor-icons/react'

interface EmptyStateProps {
  icon: Icon
  title: string
  description?: string
}

/** Placeholder shown when a dataset has no species to list */
export function EmptyState({ icon: IconComponent, title, description }: EmptyStateProps) {
  return (
    <div role="status" className="py-16 text-center space-y-3">
      <div className="mx-auto w-16 h-16 rounded-full bg-primary/10 flex items-center justify-center">
        <IconComponent size={32} className="text-primary" weight="duotone" />
      </div>
      <p className="text-lg text-muted-foreground">{title}</p>
      {description && <p className="text-sm text-muted-foreground">{description}</p>}
    </div>
  )
}
