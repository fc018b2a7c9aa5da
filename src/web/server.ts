// File: src/web/server.ts (relative to project root)
import express from 'express';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import path from 'path';
import { config } from '../config/defaults';
import { dashboardEvents } from './DashboardEvents';
import { createApiRouter } from './routes';

const app = express();
const server = createServer(app);
const io = new SocketIOServer(server, {
  cors: {
    origin: "*",
    methods: ["GET", "POST"]
  }
});

// Serve static files
app.use(express.static(path.join(__dirname, '../../public')));

app.use('/api', createApiRouter());

// Main dashboard route
app.get('/', (req, res) => {
  res.sendFile(path.join(__dirname, '../../public/dashboard.html'));
});

// WebSocket connection handling
io.on('connection', (socket) => {
  const fn = "connection";
  console.log("src/web/server.ts:%s - client connected: %s", fn, socket.id);

  // late joiners still see which run is in progress
  const lastRun = dashboardEvents.getLastRunStarted();
  if (lastRun) socket.emit('runStarted', lastRun);

  socket.on('disconnect', () => {
    console.log("src/web/server.ts:%s - client disconnected: %s", fn, socket.id);
  });
});

// Connect dashboard events to Socket.IO
dashboardEvents.onRunStarted((data) => {
  console.log("src/web/server.ts:dashboardEvents.onRunStarted - forwarding to %d clients", io.sockets.sockets.size);
  io.emit('runStarted', data);
});

dashboardEvents.onStepApplied((data) => {
  io.emit('stepApplied', data);
});

dashboardEvents.onRunCompleted((data) => {
  console.log("src/web/server.ts:dashboardEvents.onRunCompleted - forwarding completion to clients");
  io.emit('runCompleted', data);
});

export { app, io };

// Auto-start server when imported
const PORT = config.WEB_PORT;
server.listen(PORT, () => {
  const fn = "server.listen";
  console.log("src/web/server.ts:%s - Allocation efficiency API + dashboard running on http://localhost:%d", fn, PORT);
});
