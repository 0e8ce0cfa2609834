import Minesweeper from './pages/games/components/games/minesweeper/Minesweeper'

export default function App() {
  return (
    <div className="min-h-screen bg-slate-900 text-slate-100 p-4">
      <Minesweeper />
    </div>
  )
}
