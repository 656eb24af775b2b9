import { clsx } from 'clsx'

interface CardProps {
  children: React.ReactNode
  className?: string
  id?: string
}

export function Card({ children, className, id }: CardProps) {
  return (
    <section
      id={id}
      className={clsx(
        'rounded-lg border border-gray-200 bg-white scroll-mt-4',
        className
      )}
    >
      {children}
    </section>
  )
}

export function CardHeader({ children, className }: { children: React.ReactNode; className?: string }) {
  return (
    <div className={clsx('px-5 py-3.5 border-b border-gray-200', className)}>
      {children}
    </div>
  )
}

export function CardContent({ children, className }: { children: React.ReactNode; className?: string }) {
  return <div className={clsx('px-5 py-4', className)}>{children}</div>
}
