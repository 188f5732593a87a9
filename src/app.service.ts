import { Injectable } from '@nestjs/common';

@Injectable()
export class AppService {
  getHello(): string {
    return `
      <!DOCTYPE html>
      <html lang="es">
      <head>
        <meta charset="UTF-8">
        <meta name="viewport" content="width=device-width, initial-scale=1.0">
        <title>Fantasy Hockey</title>
        <style>
          body {
            margin: 0;
            font-family: system-ui, sans-serif;
            background: linear-gradient(160deg, #0b1d3a, #1f4e79);
            color: #f4f8fb;
            display: flex;
            justify-content: center;
            align-items: center;
            height: 100vh;
          }
          .container {
            max-width: 560px;
            padding: 24px 32px;
            background: rgba(255, 255, 255, 0.08);
            border-radius: 12px;
            text-align: center;
          }
          h1 { font-size: 2.2em; margin-bottom: 12px; }
          p { font-size: 1.1em; line-height: 1.5; }
          a {
            display: inline-block;
            margin: 8px;
            padding: 10px 18px;
            border-radius: 6px;
            background: #c8102e;
            color: #fff;
            text-decoration: none;
          }
        </style>
      </head>
      <body>
        <div class="container">
          <h1>Fantasy Hockey</h1>
          <p>Equipos, jugadores, partidos y ligas fantasy con puntuación semanal.</p>
          <a href="/admin">Administración</a>
          <a href="/docs">Documentación API</a>
        </div>
      </body>
      </html>
    `;
  }
}
