import { BrowserRouter, Routes, Route, Link, Navigate, useMatch } from 'react-router-dom'
import Decode from './pages/Decode'
import Endpoints from './pages/Endpoints'

function NavLink({ to, active, children }: { to: string; active: boolean; children: React.ReactNode }) {
  return (
    <Link
      to={to}
      className={`px-2 py-1 rounded transition-colors ${
        active
          ? 'text-text-primary bg-elevated'
          : 'text-text-secondary hover:text-text-primary'
      }`}
    >
      {children}
    </Link>
  )
}

function Header() {
  const isEndpoints = useMatch('/endpoints') !== null

  return (
    <header className="border-b border-border-subtle px-6 py-3 flex items-center gap-3">
      <Link to="/" className="text-lg font-semibold hover:text-text-primary transition-colors">
        SwitchOS Decoder
      </Link>
      <nav className="ml-auto flex items-center gap-1 text-sm">
        <NavLink to="/" active={!isEndpoints}>
          Decode
        </NavLink>
        <NavLink to="/endpoints" active={isEndpoints}>
          Endpoints
        </NavLink>
      </nav>
    </header>
  )
}

export default function App() {
  return (
    <BrowserRouter>
      <div className="min-h-screen bg-canvas text-text-primary">
        <Header />
        <main className="p-6">
          <Routes>
            <Route path="/" element={<Decode />} />
            <Route path="/endpoints" element={<Endpoints />} />
            <Route path="*" element={<Navigate to="/" replace />} />
          </Routes>
        </main>
      </div>
    </BrowserRouter>
  )
}
