import React from 'react';
import { LocationLogger } from './components/LocationLogger';
import { LogsPage } from './pages/LogsPage';
import './App.css';

export const isLogsPath = (pathname: string) => pathname.replace(/\/+$/, '') === '/logs';

function App() {
  return (
    <div className="App">
      {isLogsPath(window.location.pathname) ? <LogsPage /> : <LocationLogger />}
    </div>
  );
}

export default App;
