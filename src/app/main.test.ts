import { parseCommandLineArgs } from './main';

describe('parseCommandLineArgs', () => {
  it('解析端口、主机和配置文件', () => {
    expect(parseCommandLineArgs(['--port', '9000', '--host', '127.0.0.1', '--config', 'config/local.json'])).toEqual({
      port: 9000,
      host: '127.0.0.1',
      config: 'config/local.json'
    });
  });

  it('忽略无效端口', () => {
    expect(parseCommandLineArgs(['--port', 'abc'])).toEqual({});
    expect(parseCommandLineArgs(['--port', '70000'])).toEqual({});
  });

  it('缺少参数值时不吞掉下一个选项', () => {
    expect(parseCommandLineArgs(['--host', '--help'])).toEqual({ help: true });
  });

  it('识别帮助选项', () => {
    expect(parseCommandLineArgs(['-h'])).toEqual({ help: true });
  });
});
