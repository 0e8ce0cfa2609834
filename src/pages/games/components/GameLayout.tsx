/**
 * Shared game page wrapper — provides consistent chrome for a game.
 *
 * Renders: game title, optional timer display, optional controls
 * toolbar, and centered game content area.
 */

interface GameLayoutProps {
  title: string
  children: React.ReactNode
  timer?: string
  controls?: React.ReactNode
}

export function GameLayout({ title, children, timer, controls }: GameLayoutProps) {
  return (
    <div className="max-w-2xl mx-auto">
      {/* Header */}
      <div className="flex items-center justify-between mb-4">
        <h1 className="text-lg sm:text-xl font-bold text-white">{title}</h1>
        {timer && (
          <span className="text-slate-400 font-mono text-xs sm:text-sm" aria-label="Elapsed time">
            {timer}
          </span>
        )}
      </div>

      {/* Game-specific controls toolbar */}
      {controls && <div className="mb-4">{controls}</div>}

      {/* Game board area */}
      <div className="flex justify-center">
        {children}
      </div>
    </div>
  )
}
