import { BarChart3 } from 'lucide-react';

export default function Navbar() {
  return (
    <nav className="border-b border-border bg-navy-900/80 backdrop-blur">
      <div className="max-w-5xl mx-auto px-4 h-14 flex items-center gap-2">
        <BarChart3 className="w-5 h-5 text-primary-400" />
        <span className="font-semibold text-foreground">Risk-Reward Analysis Tool</span>
      </div>
    </nav>
  );
}
