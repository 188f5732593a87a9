import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';

describe('AppController', () => {
  let appController: AppController;

  beforeEach(async () => {
    const app: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [AppService],
    }).compile();

    appController = app.get<AppController>(AppController);
  });

  describe('root', () => {
    it('retorna landing HTML con enlaces a admin y docs', () => {
      const html = appController.getHello();
      expect(html).toContain('<!DOCTYPE html>');
      expect(html).toContain('<title>Fantasy Hockey</title>');
      expect(html).toContain('href="/admin"');
      expect(html).toContain('href="/docs"');
    });
  });
});
