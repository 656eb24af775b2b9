import { clsx } from 'clsx'

interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  /** solid: 본문 액션 (Retry), subtle: 사이드바 액션 (Reload) */
  tone?: 'solid' | 'subtle'
  /** 로드 중: 비활성 + 스피너 */
  busy?: boolean
}

const TONES = {
  solid: 'bg-red-500 text-white hover:bg-red-600',
  subtle: 'bg-gray-100 text-gray-700 hover:bg-gray-200',
}

export default function Button({ tone = 'solid', busy = false, disabled, className, children, ...props }: ButtonProps) {
  return (
    <button
      type="button"
      disabled={disabled || busy}
      aria-busy={busy || undefined}
      className={clsx(
        'inline-flex items-center justify-center gap-1.5 px-3 py-1.5 rounded-lg text-sm font-medium transition-colors',
        TONES[tone],
        'disabled:opacity-50 disabled:cursor-not-allowed',
        className
      )}
      {...props}
    >
      {busy && (
        <span className="h-3 w-3 rounded-full border-2 border-current border-t-transparent animate-spin" />
      )}
      {children}
    </button>
  )
}
