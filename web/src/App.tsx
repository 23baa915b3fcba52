import { useCallback, useEffect, useState } from 'react';
import { createDiagnostics } from '../../src/diagnostics';
import type { EditorAction } from '../../src/editor/types';
import { LiveSeatingEditor } from '../../src/editor/liveSeatingEditor';
import type { SeatingLayout } from '../../src/seating/layout';
import SeatingCanvas from './components/SeatingCanvas';
import Sidebar from './components/Sidebar';
import LayoutFilePanel from './components/LayoutFilePanel';
import { useSkeletonStream } from './hooks/useSkeletonStream';
import { resolveStreamUrl } from './api/client';
import type { BackgroundImage, FileStatus } from './types';
import './styles/index.css';

const STREAM_URL = resolveStreamUrl();

function App() {
  const [editor] = useState(() => new LiveSeatingEditor({ diagnostics: createDiagnostics('editor') }));
  const [revision, setRevision] = useState(0);
  const [layout, setLayout] = useState<SeatingLayout | null>(null);
  const [background, setBackground] = useState<BackgroundImage | null>(null);
  const [fileStatus, setFileStatus] = useState<{ status: FileStatus; message: string }>({
    status: 'idle',
    message: '',
  });
  const { latest, status } = useSkeletonStream(STREAM_URL);

  useEffect(() => {
    editor.setOnLayoutChanged((next) => setLayout(next));
    return () => editor.setOnLayoutChanged(null);
  }, [editor]);

  const refresh = useCallback(() => setRevision((r) => r + 1), []);

  const handleAction = (action: EditorAction) => {
    editor.perform(action);
    refresh();
  };

  const handleRename = (seatId: string) => {
    const renamed = editor.renameSelected(seatId);
    refresh();
    return renamed;
  };

  const handleLayoutLoaded = (loaded: SeatingLayout) => {
    editor.setLayout(loaded);
    setLayout(loaded);
    refresh();
  };

  return (
    <div className="app">
      <header className="app-header">
        <div>
          <p className="label">Seatstream</p>
          <h1 className="accent">Seat layout editor</h1>
        </div>
        {background && <div className="muted">{background.name}</div>}
      </header>
      <main className="app-main">
        <SeatingCanvas editor={editor} revision={revision} background={background} live={latest} onChange={refresh} />
        <div className="stack">
          <Sidebar
            seats={editor.drafts}
            selectedSeatId={editor.selectedSeatId}
            editing={editor.enabled}
            status={editor.statusMessage}
            live={latest}
            connection={status}
            onAction={handleAction}
            onRename={handleRename}
          />
          <LayoutFilePanel
            layout={layout}
            onLayoutLoaded={handleLayoutLoaded}
            onBackgroundLoaded={setBackground}
            onStatus={(next, message) => setFileStatus({ status: next, message })}
          />
          {fileStatus.status === 'error' && <p className="error">{fileStatus.message}</p>}
          {fileStatus.status !== 'error' && fileStatus.message && <p className="muted">{fileStatus.message}</p>}
        </div>
      </main>
    </div>
  );
}

export default App;
