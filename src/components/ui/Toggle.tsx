import { clsx } from 'clsx'

interface ToggleProps {
  label: string
  checked: boolean
  onChange: (checked: boolean) => void
  help?: string
}

export default function Toggle({ label, checked, onChange, help }: ToggleProps) {
  return (
    <button
      type="button"
      role="switch"
      aria-checked={checked}
      title={help}
      onClick={() => onChange(!checked)}
      className="flex items-center justify-between w-full px-2.5 py-1.5 rounded-lg text-sm transition-colors hover:bg-gray-100"
    >
      <span className="text-gray-700">{label}</span>
      <span
        className={clsx(
          'relative inline-flex h-5 w-9 flex-shrink-0 rounded-full transition-colors duration-150',
          checked ? 'bg-red-500' : 'bg-gray-300'
        )}
      >
        <span
          className={clsx(
            'absolute top-0.5 h-4 w-4 rounded-full bg-white shadow transition-transform duration-150',
            checked ? 'translate-x-4' : 'translate-x-0.5'
          )}
        />
      </span>
    </button>
  )
}
